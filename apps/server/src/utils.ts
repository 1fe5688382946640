export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export function nowIso(): string {
  return new Date().toISOString();
}

export function pairKey(student: string, slug: string): string {
  return `${student}::${slug}`;
}
