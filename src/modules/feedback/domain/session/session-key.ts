export function buildSessionKey(input: { userId: string; threadTs: string }): string {
  return `${input.userId}:${input.threadTs}`;
}
