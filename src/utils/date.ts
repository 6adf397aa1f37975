export function todayIso(now: Date = new Date()): string {
  return now.toISOString().split('T')[0];
}
