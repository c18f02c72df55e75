import "dotenv/config";
import { z } from "zod";
import { fromZodError } from "zod-validation-error";

const pricingConfigSchema = z.object({
  deletedProductRetentionDays: z.coerce.number().int().positive().default(30),
  resolveFuzzyThreshold: z.coerce.number().min(0).max(1).default(0.3),
  searchFuzzyThreshold: z.coerce.number().min(0).max(1).default(0.15),
  searchLimit: z.coerce.number().int().positive().default(15),
  // IANA zone used to decide which calendar day schemes are checked against
  schemeTimeZone: z.string().trim().min(1).optional(),
});

export type PricingConfig = z.infer<typeof pricingConfigSchema>;

export const DEFAULT_PRICING_CONFIG: PricingConfig = pricingConfigSchema.parse({});

function emptyToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Build the pricing configuration from environment variables.
 *
 * @throws Error with a readable zod message when a variable is malformed
 */
export function loadPricingConfig(env: NodeJS.ProcessEnv = process.env): PricingConfig {
  const parsed = pricingConfigSchema.safeParse({
    deletedProductRetentionDays: emptyToUndefined(env.DELETED_PRODUCT_RETENTION_DAYS),
    resolveFuzzyThreshold: emptyToUndefined(env.RESOLVE_FUZZY_THRESHOLD),
    searchFuzzyThreshold: emptyToUndefined(env.SEARCH_FUZZY_THRESHOLD),
    searchLimit: emptyToUndefined(env.SEARCH_LIMIT),
    schemeTimeZone: emptyToUndefined(env.SCHEME_TIMEZONE),
  });

  if (!parsed.success) {
    throw new Error(`Invalid pricing configuration: ${fromZodError(parsed.error).message}`);
  }

  return parsed.data;
}
