export type SpeedupTier = "infinite" | "fast" | "quick" | "moderate" | "slight" | "parity" | "slower";

interface TierRule {
  tier: SpeedupTier;
  min: number;
  digits: number;
  marker: string;
}

// Checked top to bottom; the first rule whose threshold is met applies.
const TIER_RULES: readonly TierRule[] = [
  { tier: "fast", min: 10, digits: 1, marker: "🚀" },
  { tier: "quick", min: 2, digits: 1, marker: "⚡" },
  { tier: "moderate", min: 1.5, digits: 1, marker: "📈" },
  { tier: "slight", min: 1.1, digits: 2, marker: "➕" },
  { tier: "parity", min: 0.9, digits: 2, marker: "≈" },
  { tier: "slower", min: Number.NEGATIVE_INFINITY, digits: 2, marker: "📉" },
];

const INFINITE_SPEEDUP = "∞x 🚀";

export function formatTime(seconds: number): string {
  if (seconds < 0.001) return `${(seconds * 1_000_000).toFixed(1)}μs`;
  if (seconds < 1.0) return `${(seconds * 1000).toFixed(1)}ms`;
  return `${seconds.toFixed(3)}s`;
}

function tierRuleFor(speedup: number): TierRule {
  const rule = TIER_RULES.find((r) => speedup >= r.min);
  // NaN fails every comparison and falls through to the slowest tier.
  return rule ?? TIER_RULES[TIER_RULES.length - 1];
}

export function speedupTier(speedup: number): SpeedupTier {
  if (speedup === Number.POSITIVE_INFINITY) return "infinite";
  return tierRuleFor(speedup).tier;
}

export function formatSpeedup(speedup: number): string {
  if (speedup === Number.POSITIVE_INFINITY) return INFINITE_SPEEDUP;
  const rule = tierRuleFor(speedup);
  return `${speedup.toFixed(rule.digits)}x ${rule.marker}`;
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/** `YYYY-MM-DD HH:MM:SS` in local time. */
export function formatDateTime(date: Date): string {
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${day} ${time}`;
}

/** `YYYYMMDD_HHMMSS` in local time, used to suffix report file names. */
export function formatFileStamp(date: Date): string {
  const day = `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function titleCase(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}
