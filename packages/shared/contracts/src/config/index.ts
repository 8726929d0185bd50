/**
 * SDK Environment Contracts
 *
 * Environment variables read when bootstrapping a preference store.
 */

import { z } from 'zod';
import { VisibilityLevelSchema, VisibilitySchema } from '../services/index.js';
import { ProviderNameSchema } from '../providers/index.js';

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim().length > 0 ? value.trim() : undefined));

export const SdkEnvironmentSchema = z.object({
  SDK_PROVIDER: ProviderNameSchema.default('identity'),
  SDK_PROVIDER_MANIFEST: optionalString,
  SDK_DEFAULT_VISIBILITY: VisibilityLevelSchema.default('unset'),
  SDK_REGION: optionalString,
  SDK_INTERFACE: VisibilitySchema.optional(),
});
export type SdkEnvironment = z.infer<typeof SdkEnvironmentSchema>;
