/**
 * Provider Contracts
 *
 * Shape of provider manifest files used for file-based provider discovery.
 */

import { z } from 'zod';

export const AuthPluginNameSchema = z.enum(['discoverable', 'v2', 'v3']);
export type AuthPluginName = z.infer<typeof AuthPluginNameSchema>;

export const ProviderNameSchema = z
  .string()
  .min(1)
  .regex(/^[a-z0-9][a-z0-9._-]*$/, 'Provider names are lowercase letters, digits, ".", "_" or "-"');

export const ProviderManifestEntrySchema = z.object({
  name: ProviderNameSchema,
  extends: ProviderNameSchema.optional(),
  auth: AuthPluginNameSchema.optional(),
  description: z.string().optional(),
});
export type ProviderManifestEntry = z.infer<typeof ProviderManifestEntrySchema>;

export const ProviderManifestSchema = z.object({
  providers: z.array(ProviderManifestEntrySchema),
});
export type ProviderManifest = z.infer<typeof ProviderManifestSchema>;
