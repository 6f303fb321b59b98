/**
 * Planner - expands matrix set definitions into matrix UUIDs and build tasks
 *
 * For every matrix set and every label name × label type × state × feature
 * dictionary combination, the planner synthesizes train and test metadata,
 * derives a UUID from each record and registers one build task per UUID.
 * Each combination yields its own annotated copy of the matrix set.
 *
 * Planning only: nothing is built, scheduled or persisted here.
 */

import { z } from 'zod';
import {
  COMPUTED_METADATA_FIELDS,
  ComputedMatrixMetadataSchema,
  TimestampSchema,
  generateMatrixUuid,
  noopPlanObserver,
  type AnnotatedMatrixSetDefinition,
  type BuildTask,
  type ComputedMetadataField,
  type FeatureDictionary,
  type MatrixMetadata,
  type MatrixSetDefinition,
  type MatrixType,
  type MatrixUuidFn,
  type PlanObserver,
  type PlanResult,
  type TemporalWindow,
} from '@matrixplan/core';
import { ConfigurationError, ValidationError } from '@matrixplan/utils';
import { BuildTaskRegistry } from './build-task-registry.js';
import {
  synthesizeMatrixMetadata,
  type MatrixCombination,
  type MetadataContext,
} from './metadata.js';

export const DEFAULT_ACTIVE_STATE = 'active';

export const DEFAULT_COHORT_NAME = 'default';

export const PlannerConfigSchema = z.object({
  /** Earliest time included in features */
  featureStartTime: TimestampSchema,
  labelNames: z.array(z.string()),
  labelTypes: z.array(z.string()),
  /** Entity state expressions; absent or empty means the active state only */
  states: z.array(z.string()).nullish(),
  matrixDirectory: z.string().min(1),
  userMetadata: z.record(z.unknown()).default({}),
  cohortName: z.string().default(DEFAULT_COHORT_NAME),
  /**
   * Computed metadata fields user metadata may override.
   * Defaults to all of them.
   */
  overridableFields: z.array(ComputedMatrixMetadataSchema.keyof()).optional(),
});

export type PlannerConfig = z.input<typeof PlannerConfigSchema>;

export interface PlannerOptions {
  observer?: PlanObserver;
  /** Matrix identifier function; defaults to the content hash from @matrixplan/core */
  generateUuid?: MatrixUuidFn;
}

/**
 * Check user metadata against the computed-field allow-list and types
 *
 * @throws ConfigurationError if a key overrides a computed field that is not overridable
 * @throws ValidationError if an allowed override has the wrong type
 */
export function validateUserMetadata(
  userMetadata: Readonly<Record<string, unknown>>,
  overridableFields: readonly ComputedMetadataField[] = COMPUTED_METADATA_FIELDS
): void {
  const computedFields = new Set<string>(COMPUTED_METADATA_FIELDS);
  const allowed = new Set<string>(overridableFields);
  const overrides: Record<string, unknown> = {};

  for (const [field, value] of Object.entries(userMetadata)) {
    if (!computedFields.has(field)) {
      continue;
    }
    if (!allowed.has(field)) {
      throw new ConfigurationError(
        `User metadata may not override computed field '${field}'`,
        'userMetadata',
        { field, overridableFields: [...allowed] }
      );
    }
    overrides[field] = value;
  }

  const parsed = ComputedMatrixMetadataSchema.partial().safeParse(overrides);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ValidationError(`Invalid user metadata override: ${issues}`, {
      issues: parsed.error.issues,
    });
  }
}

/**
 * Cross product in planning order: label name outermost, feature dictionary innermost
 */
export function expandCombinations(
  labelNames: readonly string[],
  labelTypes: readonly string[],
  states: readonly string[],
  featureDictionaries: readonly FeatureDictionary[]
): MatrixCombination[] {
  const combinations: MatrixCombination[] = [];
  for (const labelName of labelNames) {
    for (const labelType of labelTypes) {
      for (const state of states) {
        for (const featureDictionary of featureDictionaries) {
          combinations.push({ labelName, labelType, state, featureDictionary });
        }
      }
    }
  }
  return combinations;
}

export class Planner {
  readonly labelNames: readonly string[];
  readonly labelTypes: readonly string[];
  readonly states: readonly string[];
  readonly matrixDirectory: string;
  readonly cohortName: string;

  private readonly metadataContext: MetadataContext;
  private readonly observer: PlanObserver;
  private readonly generateUuid: MatrixUuidFn;

  /**
   * @throws ValidationError if the configuration is malformed
   * @throws ConfigurationError if user metadata overrides a protected field
   */
  constructor(config: PlannerConfig, options: PlannerOptions = {}) {
    const parsed = PlannerConfigSchema.safeParse(config);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new ValidationError(`Invalid planner configuration: ${issues}`, {
        issues: parsed.error.issues,
      });
    }
    const settings = parsed.data;

    validateUserMetadata(settings.userMetadata, settings.overridableFields);

    this.labelNames = [...settings.labelNames];
    this.labelTypes = [...settings.labelTypes];
    this.states =
      settings.states && settings.states.length > 0 ? [...settings.states] : [DEFAULT_ACTIVE_STATE];
    this.matrixDirectory = settings.matrixDirectory;
    this.cohortName = settings.cohortName;
    this.metadataContext = {
      featureStartTime: settings.featureStartTime,
      cohortName: settings.cohortName,
      // Copied so later changes to the caller's object cannot alter UUIDs
      userMetadata: structuredClone(settings.userMetadata),
    };
    this.observer = options.observer ?? noopPlanObserver;
    this.generateUuid = options.generateUuid ?? generateMatrixUuid;
  }

  /**
   * Metadata record for one matrix under this planner's configuration
   */
  makeMetadata(
    window: TemporalWindow,
    combination: MatrixCombination,
    matrixType: MatrixType
  ): MatrixMetadata {
    return synthesizeMatrixMetadata(window, combination, matrixType, this.metadataContext);
  }

  /**
   * Create build tasks and annotate matrix set copies with matrix UUIDs
   *
   * @param matrixSetDefinitions - temporal definitions; left unmodified
   * @param featureDictionaries - feature combinations to include in matrices
   */
  generatePlans(
    matrixSetDefinitions: readonly MatrixSetDefinition[],
    featureDictionaries: readonly FeatureDictionary[]
  ): PlanResult {
    const updatedDefinitions: AnnotatedMatrixSetDefinition[] = [];
    const registry = new BuildTaskRegistry();
    const combinations = expandCombinations(
      this.labelNames,
      this.labelTypes,
      this.states,
      featureDictionaries
    );

    matrixSetDefinitions.forEach((matrixSet, matrixSetIndex) => {
      this.observer.onMatrixSetStart?.({
        matrixSetIndex,
        matrixSet,
        labelNameCount: this.labelNames.length,
        labelTypeCount: this.labelTypes.length,
        stateCount: this.states.length,
        featureDictionaryCount: featureDictionaries.length,
      });

      for (const combination of combinations) {
        const clone = structuredClone(matrixSet);

        const trainUuid = this.planMatrix(
          registry,
          clone.train_matrix,
          combination,
          'train',
          matrixSetIndex
        );
        const testUuids = clone.test_matrices.map((testMatrix) =>
          this.planMatrix(registry, testMatrix, combination, 'test', matrixSetIndex)
        );

        updatedDefinitions.push({ ...clone, train_uuid: trainUuid, test_uuids: testUuids });
      }
    });

    this.observer.onPlanComplete?.({
      definitionCount: updatedDefinitions.length,
      buildTaskCount: registry.size,
    });

    return { updatedDefinitions, buildTasks: registry.toRecord() };
  }

  private planMatrix(
    registry: BuildTaskRegistry,
    window: TemporalWindow,
    combination: MatrixCombination,
    matrixType: MatrixType,
    matrixSetIndex: number
  ): string {
    const metadata = this.makeMetadata(window, combination, matrixType);
    const matrixUuid = this.generateUuid(metadata);

    const { added } = registry.insertIfAbsent(matrixUuid, () =>
      this.createBuildTask(metadata, matrixUuid, window, combination.featureDictionary)
    );
    this.observer.onMatrixPlanned?.({ matrixSetIndex, matrixType, matrixUuid, metadata, added });

    return matrixUuid;
  }

  private createBuildTask(
    metadata: MatrixMetadata,
    matrixUuid: string,
    window: TemporalWindow,
    featureDictionary: FeatureDictionary
  ): BuildTask {
    return {
      asOfTimes: structuredClone(window.as_of_times),
      labelName: metadata.label_name,
      labelType: metadata.label_type,
      featureDictionary,
      matrixDirectory: this.matrixDirectory,
      matrixUuid,
      matrixMetadata: metadata,
      matrixType: metadata.matrix_type,
    };
  }
}
