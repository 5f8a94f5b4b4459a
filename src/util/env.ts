// Environment switches are read defensively so the core also loads where `process` is absent.
export const envFlag = (name: string): boolean => {
  try {
    if (typeof process === 'undefined' || !process.env) return false;
    const v = process.env[name];
    return v === '1' || v === 'true';
  } catch {
    return false;
  }
};

export const envNumber = (name: string, fallback: number): number => {
  if (typeof process === 'undefined' || !process.env) return fallback;
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const v = Number(raw);
  return Number.isFinite(v) ? v : fallback;
};

export const envString = (name: string, fallback: string): string => {
  if (typeof process === 'undefined' || !process.env) return fallback;
  const raw = process.env[name];
  return raw === undefined || raw === '' ? fallback : raw;
};
