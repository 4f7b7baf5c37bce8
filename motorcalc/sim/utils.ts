export const clamp = (v: number, min: number, max: number) =>
  Math.max(min, Math.min(max, v));

export const toHp = (watts: number, wattsPerHp: number) => watts / wattsPerHp;

export const toNcm = (nm: number) => nm * 100;

export const capitalize = (text: string) =>
  text.length === 0 ? text : text.charAt(0).toUpperCase() + text.slice(1);
