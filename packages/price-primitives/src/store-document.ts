import { z } from "zod";
import { DEFAULT_STORE_VERSION, type PriceObservation } from "./types.ts";

export interface PriceStoreDocument {
  version: number;
  updatedAtMs: number;
  records: PriceObservation[];
}

const observationSchema = z.object({
  symbol: z.string().min(1),
  price: z.number().finite().nonnegative(),
  observedAt: z.number().finite(),
  sequenceId: z.number().int().nonnegative(),
  ingestedAt: z.number().finite(),
});

const documentSchema = z.object({
  version: z.literal(DEFAULT_STORE_VERSION),
  updatedAtMs: z.number(),
  records: z.array(observationSchema),
});

export const STORE_FILE_NAME = "prices.json";

export function createEmptyStore(): PriceStoreDocument {
  return {
    version: DEFAULT_STORE_VERSION,
    updatedAtMs: Date.now(),
    records: [],
  };
}

export function encodeStore(records: PriceObservation[]): string {
  const document: PriceStoreDocument = {
    version: DEFAULT_STORE_VERSION,
    updatedAtMs: Date.now(),
    records,
  };
  return `${JSON.stringify(document, null, 2)}\n`;
}

export function decodeStore(content: string): PriceStoreDocument {
  if (content.trim() === "") {
    return createEmptyStore();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new Error(
      `Price store is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const result = documentSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    throw new Error(`Invalid price store document: ${JSON.stringify(issues)}`);
  }
  return result.data;
}
