/**
 * Matrix planning types
 *
 * Record keys that end up in matrix metadata (and therefore in matrix UUIDs)
 * keep their wire names. Result objects owned by the planner are camelCase.
 */

import { z } from 'zod';

/**
 * Timestamp as it arrives from the time-chopping step: ISO string or Date
 */
export const TimestampSchema = z.union([z.string(), z.date()]);

export type Timestamp = z.infer<typeof TimestampSchema>;

export const MATRIX_TYPES = ['train', 'test'] as const;

export type MatrixType = (typeof MATRIX_TYPES)[number];

/**
 * One temporal window (train or test). Extra fields such as
 * `max_training_history` pass through untouched.
 */
export const TemporalWindowSchema = z
  .object({
    first_as_of_time: TimestampSchema,
    matrix_info_end_time: TimestampSchema,
    as_of_times: z.array(TimestampSchema),
    training_as_of_date_frequency: z.string().optional(),
    test_as_of_date_frequency: z.string().optional(),
    training_label_timespan: z.string().optional(),
    test_label_timespan: z.string().optional(),
  })
  .passthrough();

export type TemporalWindow = z.infer<typeof TemporalWindowSchema>;

export const MatrixSetDefinitionSchema = z
  .object({
    train_matrix: TemporalWindowSchema,
    test_matrices: z.array(TemporalWindowSchema),
  })
  .passthrough();

export type MatrixSetDefinition = z.infer<typeof MatrixSetDefinitionSchema>;

/**
 * Matrix set definition annotated with the UUIDs of its planned matrices.
 * `test_uuids` is parallel to `test_matrices`.
 */
export type AnnotatedMatrixSetDefinition = MatrixSetDefinition & {
  train_uuid: string;
  test_uuids: string[];
};

/**
 * Feature table name → feature column names sourced from that table
 */
export const FeatureDictionarySchema = z.record(z.array(z.string()));

export type FeatureDictionary = z.infer<typeof FeatureDictionarySchema>;

/**
 * Index columns every matrix is keyed on
 */
export const MATRIX_INDICES = ['entity_id', 'as_of_date'] as const;

/**
 * Fields computed by metadata synthesis, before window and user overlays.
 * User metadata that overrides one of these must still match its type.
 */
export const ComputedMatrixMetadataSchema = z.object({
  // temporal information
  feature_start_time: TimestampSchema,
  end_time: TimestampSchema,
  as_of_date_frequency: z.string().optional(),

  // columns
  indices: z.array(z.string()),
  feature_names: z.array(z.string()),
  feature_groups: z.array(z.string()),
  label_name: z.string(),

  // other information
  label_type: z.string(),
  label_timespan: z.string(),
  cohort_name: z.string(),
  state: z.string(),
  matrix_id: z.string(),
  matrix_type: z.enum(MATRIX_TYPES),
});

export type ComputedMatrixMetadata = z.infer<typeof ComputedMatrixMetadataSchema>;

export const COMPUTED_METADATA_FIELDS = ComputedMatrixMetadataSchema.keyof().options;

export type ComputedMetadataField = keyof ComputedMatrixMetadata;

/**
 * Full metadata record: computed fields, overlaid by window fields, overlaid
 * by user metadata.
 */
export type MatrixMetadata = ComputedMatrixMetadata & Record<string, unknown>;

/**
 * Everything an external builder needs to materialize one matrix
 */
export interface BuildTask {
  asOfTimes: Timestamp[];
  labelName: string;
  labelType: string;
  featureDictionary: FeatureDictionary;
  matrixDirectory: string;
  matrixUuid: string;
  matrixMetadata: MatrixMetadata;
  matrixType: MatrixType;
}

export interface PlanResult {
  updatedDefinitions: AnnotatedMatrixSetDefinition[];
  buildTasks: Record<string, BuildTask>;
}

/**
 * Planner input as read from a file
 */
export const PlanInputSchema = z.object({
  matrixSetDefinitions: z.array(MatrixSetDefinitionSchema),
  featureDictionaries: z.array(FeatureDictionarySchema),
});

export type PlanInput = z.infer<typeof PlanInputSchema>;
