// Console step log for chain runs. QUIET=1 silences everything; LOG_STEPS=0 hides per-step lines.

const COLOR = {
  reset: "\x1b[0m",
  gray: (s: string) => `\x1b[90m${s}${COLOR.reset}`,
  cyan: (s: string) => `\x1b[36m${s}${COLOR.reset}`,
  green: (s: string) => `\x1b[32m${s}${COLOR.reset}`,
  yellow: (s: string) => `\x1b[33m${s}${COLOR.reset}`,
  red: (s: string) => `\x1b[31m${s}${COLOR.reset}`,
  magenta: (s: string) => `\x1b[35m${s}${COLOR.reset}`,
};

const QUIET = process.env.QUIET === "1";
const LOG_STEPS = !QUIET && (process.env.LOG_STEPS ?? "1") !== "0";

export const fmtMs = (ms: number) => `${Math.round(ms)}ms`;

export function step(chain: string, index: number, total: number, label: string): void {
  if (!LOG_STEPS) return;
  console.log(`${COLOR.cyan("▶ step")} ${index + 1}/${total} ${COLOR.gray(`[${chain}]`)} ${label}`);
}

export function done(chain: string, index: number, kind: string, ms: number): void {
  if (!LOG_STEPS) return;
  console.log(`${COLOR.green("✓ done")} step ${index + 1} ${COLOR.gray(`[${chain}] ${kind} (${fmtMs(ms)})`)}`);
}

export function retry(chain: string, index: number, attempt: number, maxAttempts: number, reason: string): void {
  if (QUIET) return;
  console.warn(COLOR.yellow(`⚠ step ${index + 1} [${chain}] attempt ${attempt}/${maxAttempts}: ${reason}. Retrying...`));
}

export function fail(chain: string, index: number, attempts: number, reason: string): void {
  if (QUIET) return;
  console.error(COLOR.red(`✗ step ${index + 1} [${chain}] failed after ${attempts} attempts: ${reason}. Stopping chain.`));
}

export function unsaved(chain: string, index: number, reason: string): void {
  if (QUIET) return;
  console.error(COLOR.red(`✗ step ${index + 1} [${chain}] result not saved: ${reason}. Stopping chain.`));
}

export function artifact(key: string): void {
  if (!LOG_STEPS) return;
  console.log(COLOR.magenta(`  ↳ artifact ${key}`));
}

export function fanout(done: number, total: number, name: string, ok: boolean): void {
  if (!LOG_STEPS) return;
  const mark = ok ? COLOR.green("✓") : COLOR.red("✗");
  console.log(`${mark} backend ${name} ${COLOR.gray(`(${done}/${total})`)}`);
}
