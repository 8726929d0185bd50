/**
 * Service Contracts
 *
 * Visibility levels and descriptor snapshots shared between the SDK core
 * and anything that renders or persists service preferences.
 */

import { z } from 'zod';

// =============================================================================
// VISIBILITY
// =============================================================================

export const VISIBILITY = {
  PUBLIC: 'public',
  INTERNAL: 'internal',
  ADMIN: 'admin',
} as const;

export const VISIBILITY_UNSET = 'unset' as const;

export const VisibilitySchema = z.enum([VISIBILITY.PUBLIC, VISIBILITY.INTERNAL, VISIBILITY.ADMIN]);
export type Visibility = z.infer<typeof VisibilitySchema>;

export const VisibilityLevelSchema = z.union([VisibilitySchema, z.literal(VISIBILITY_UNSET)]);
export type VisibilityLevel = z.infer<typeof VisibilityLevelSchema>;

/**
 * Accepts an explicit level, `unset`, `null` or `undefined`.
 * The three "no value" spellings all normalize to `unset`.
 */
export const VisibilityInputSchema = z
  .union([VisibilityLevelSchema, z.null(), z.undefined()])
  .transform((value): VisibilityLevel => value ?? VISIBILITY_UNSET);
export type VisibilityInput = z.input<typeof VisibilityInputSchema>;

export function isVisibility(value: unknown): value is Visibility {
  return VisibilitySchema.safeParse(value).success;
}

// =============================================================================
// SERVICE DESCRIPTOR SNAPSHOT
// =============================================================================

export const ServiceTypeSchema = z.string().min(1);
export type ServiceType = z.infer<typeof ServiceTypeSchema>;

export const ServiceDescriptorSnapshotSchema = z.object({
  serviceType: ServiceTypeSchema,
  serviceName: z.string().optional(),
  region: z.string().optional(),
  version: z.string().optional(),
  visibility: VisibilityLevelSchema,
});
export type ServiceDescriptorSnapshot = z.infer<typeof ServiceDescriptorSnapshotSchema>;

export const PreferenceSnapshotSchema = z.record(ServiceDescriptorSnapshotSchema);
export type PreferenceSnapshot = z.infer<typeof PreferenceSnapshotSchema>;
