export type Clock = () => number;

export function nowMs(): number {
  return Date.now();
}
