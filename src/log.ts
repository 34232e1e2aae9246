export const COLOR = {
  reset: "\x1b[0m",
  gray: (s: string) => `\x1b[90m${s}${COLOR.reset}`,
  red: (s: string) => `\x1b[31m${s}${COLOR.reset}`,
  cyan: (s: string) => `\x1b[36m${s}${COLOR.reset}`,
  green: (s: string) => `\x1b[32m${s}${COLOR.reset}`,
  yellow: (s: string) => `\x1b[33m${s}${COLOR.reset}`,
  magenta: (s: string) => `\x1b[35m${s}${COLOR.reset}`,
};

const QUIET = process.env.QUIET === "1";
export const LOG_STEPS = !QUIET && (process.env.LOG_STEPS ?? "1") !== "0";
export const LOG_CALLS = !QUIET && (process.env.LOG_CALLS ?? "0") === "1";

export const fmtMs = (ms: number) => `${Math.round(ms)}ms`;

export const clip = (s: string, max = 140) => (s.length > max ? s.slice(0, max) + "…" : s);
