import { randomBytes } from "node:crypto";

const pad = (value: number): string => value.toString().padStart(2, "0");

const normalizeSuffix = (value: string): string => {
  const normalized = value.toLowerCase().replace(/[^a-f0-9]/g, "");
  if (normalized.length === 0) {
    return "000000";
  }
  if (normalized.length >= 6) {
    return normalized.slice(0, 6);
  }
  return normalized.padEnd(6, "0");
};

export const formatUtcStamp = (now: Date): string =>
  `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}T${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}Z`;

/** `YYYYMMDDTHHMMSSZ_<6 hex>`, used for both benchmark and paper run ids. */
export const generateRunId = (
  now: Date = new Date(),
  options?: {
    suffix?: string;
  }
): string => {
  const suffix =
    options?.suffix !== undefined
      ? normalizeSuffix(options.suffix)
      : randomBytes(3).toString("hex");
  return `${formatUtcStamp(now)}_${suffix}`;
};

export const RUN_ID_PATTERN = /^\d{8}T\d{6}Z_[0-9a-f]{6}$/;

export const slugifyPaperName = (name: string): string => {
  const slug = name
    .replace(/\.pdf$/i, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 60);
  return slug.length > 0 ? slug : "paper";
};
