import type { MetadataValue } from "../index/IndexTypes.js";

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const isMetadataValue = (value: unknown): value is MetadataValue =>
  typeof value === "string" || typeof value === "number" || typeof value === "boolean";

export const optionalString = (value: unknown): string | undefined =>
  typeof value === "string" ? value : undefined;

export const optionalNumber = (value: unknown): number | undefined =>
  typeof value === "number" && Number.isFinite(value) ? value : undefined;
