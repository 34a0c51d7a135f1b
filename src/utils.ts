export const clamp = (v: number, min: number, max: number) => Math.max(min, Math.min(max, v));
export const fmt = (n: number, d = 2) => n.toLocaleString('en-US', { minimumFractionDigits: d, maximumFractionDigits: d });
