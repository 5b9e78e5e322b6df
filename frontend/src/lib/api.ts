import axios from "axios";

import { DATA_BASE_URL } from "./apiBase";
import { ConfigurationError, LookupError } from "./errors";
import { tuitionReferenceSchema, type CareType, type TuitionReference, type TuitionTable } from "./schemas";

export const TUITION_RATES_PATH = "/data/tuition-rates.json";

export type JsonGetter = (url: string) => Promise<{ data: unknown }>;

const getJson: JsonGetter = (url) =>
  axios.get<unknown>(url, {
    headers: { Accept: "application/json" },
  });

export async function loadTuitionReference(
  baseUrl: string = DATA_BASE_URL,
  get: JsonGetter = getJson,
): Promise<TuitionReference> {
  const response = await get(`${baseUrl}${TUITION_RATES_PATH}`);
  const parsed = tuitionReferenceSchema.safeParse(response.data);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new ConfigurationError(
      `Tuition reference data is malformed at ${first.path.join(".") || "root"}: ${first.message}`,
    );
  }
  return parsed.data;
}

export function listRegions(reference: TuitionReference, careType: CareType): string[] {
  return Object.keys(reference[careType]).sort((a, b) => a.localeCompare(b));
}

export function resolveTuitionTable(
  reference: TuitionReference,
  careType: string,
  region: string,
): TuitionTable {
  if (careType !== "center-based" && careType !== "family-care") {
    throw new LookupError(careType, `Unknown care type "${careType}".`);
  }
  const regions = reference[careType];
  if (!Object.hasOwn(regions, region)) {
    throw new LookupError(region, `No tuition figures for region "${region}".`);
  }
  return regions[region];
}

export function describeLoadError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return `Could not load tuition data (HTTP ${error.response.status}).`;
    }
    return `Could not reach the tuition data source: ${error.message}`;
  }
  return error instanceof Error ? error.message : "something went wrong";
}
