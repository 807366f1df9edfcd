/**
 * @yield-proxy/proxy — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { getAddress, isAddress } from "viem";
import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

const AddressSchema = z
  .string()
  .refine((value) => isAddress(value, { strict: false }), { message: "Invalid address" })
  .transform((value) => getAddress(value));

export const ProxyConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Roles
  PROXY_FACTORY_ADDRESS: AddressSchema,
  PROXY_TREASURY_ADDRESS: AddressSchema,
  PROXY_EXECUTOR_ADDRESS: AddressSchema,

  // Factory default for proxies created without a fee rate (client keeps 87%)
  PROXY_DEFAULT_FEE_BPS: z.coerce.number().int().min(1).max(10_000).default(8700),
});

export type ProxyConfig = z.infer<typeof ProxyConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadProxyConfig(
  env: Record<string, string | undefined> = process.env,
): ProxyConfig {
  return ProxyConfigSchema.parse(env);
}
