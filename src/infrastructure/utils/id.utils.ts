export function runId(now: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const base =
    now.getFullYear() +
    pad(now.getMonth() + 1) +
    pad(now.getDate()) +
    "-" +
    pad(now.getHours()) +
    pad(now.getMinutes()) +
    pad(now.getSeconds());
  const rand = Math.random().toString(36).slice(2, 6);
  return "run_" + base + "_" + rand;
}
