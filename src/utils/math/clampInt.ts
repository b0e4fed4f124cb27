export const clampInt = (value: number, min: number, max: number, fallback = min) => {
  const v = Math.floor(Number(value));
  if (!Number.isFinite(v)) return fallback;
  return Math.max(min, Math.min(max, v));
};
