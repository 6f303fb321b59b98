/**
 * Matrix metadata synthesis
 *
 * Builds the self-describing metadata record for one temporal window and one
 * (feature dictionary, label, state) combination. The record is built as an
 * ordered sequence of overlays: computed fields, then the raw window fields,
 * then user metadata. Later overlays win on key collisions.
 *
 * Pure function of its arguments: identical content yields an identical
 * record, and so an identical matrix UUID.
 */

import { DateTime } from 'luxon';
import {
  MATRIX_INDICES,
  featureGroupNames,
  flattenFeatureNames,
  type ComputedMatrixMetadata,
  type FeatureDictionary,
  type MatrixMetadata,
  type MatrixType,
  type TemporalWindow,
  type Timestamp,
} from '@matrixplan/core';

export const DEFAULT_LABEL_TIMESPAN = '0 days';

export const MATRIX_ID_SEPARATOR = '_';

/**
 * Planner-level settings that flow into every record
 */
export interface MetadataContext {
  featureStartTime: Timestamp;
  cohortName: string;
  userMetadata: Readonly<Record<string, unknown>>;
}

/**
 * One point of the label × state × feature-dictionary cross product
 */
export interface MatrixCombination {
  featureDictionary: FeatureDictionary;
  labelName: string;
  labelType: string;
  state: string;
}

export type MetadataOverlaySource = 'window' | 'user';

export interface MetadataOverlay {
  source: MetadataOverlaySource;
  fields: Readonly<Record<string, unknown>>;
}

/**
 * Render a timestamp for the human-readable matrix id
 */
export function formatTimestamp(value: unknown): string {
  if (value instanceof Date) {
    return DateTime.fromJSDate(value, { zone: 'utc' }).toFormat('yyyy-MM-dd HH:mm:ss');
  }
  return String(value);
}

/**
 * Human-readable matrix id. Not unique; the UUID is.
 */
export function buildMatrixId(labelName: string, labelType: string, window: TemporalWindow): string {
  return [
    labelName,
    labelType,
    formatTimestamp(window.first_as_of_time),
    formatTimestamp(window.matrix_info_end_time),
  ].join(MATRIX_ID_SEPARATOR);
}

/**
 * As-of-date frequency, preferring the field for the record's own matrix type
 */
export function resolveAsOfDateFrequency(
  window: TemporalWindow,
  matrixType: MatrixType
): string | undefined {
  const training = window.training_as_of_date_frequency;
  const test = window.test_as_of_date_frequency;
  return matrixType === 'train' ? (training ?? test) : (test ?? training);
}

/**
 * Label timespan: test field, then training field, then '0 days'.
 * The order does not depend on the matrix type.
 */
export function resolveLabelTimespan(window: TemporalWindow): string {
  return window.test_label_timespan ?? window.training_label_timespan ?? DEFAULT_LABEL_TIMESPAN;
}

/**
 * Apply overlays in order; undefined values are skipped so absent fields stay absent.
 * Overlay values are copied, so records share no nested state with their
 * inputs or with each other.
 */
export function applyOverlays(
  computed: ComputedMatrixMetadata,
  overlays: readonly MetadataOverlay[]
): MatrixMetadata {
  const record: MatrixMetadata = structuredClone(computed);
  if (record.as_of_date_frequency === undefined) {
    delete record.as_of_date_frequency;
  }

  for (const overlay of overlays) {
    for (const [key, value] of Object.entries(overlay.fields)) {
      if (value !== undefined) {
        record[key] = structuredClone(value);
      }
    }
  }
  return record;
}

/**
 * Synthesize the metadata record for one matrix
 */
export function synthesizeMatrixMetadata(
  window: TemporalWindow,
  combination: MatrixCombination,
  matrixType: MatrixType,
  context: MetadataContext
): MatrixMetadata {
  const { featureDictionary, labelName, labelType, state } = combination;

  const computed: ComputedMatrixMetadata = {
    feature_start_time: context.featureStartTime,
    end_time: window.matrix_info_end_time,
    as_of_date_frequency: resolveAsOfDateFrequency(window, matrixType),

    indices: [...MATRIX_INDICES],
    feature_names: flattenFeatureNames(featureDictionary),
    feature_groups: featureGroupNames(featureDictionary),
    label_name: labelName,

    label_type: labelType,
    label_timespan: resolveLabelTimespan(window),
    cohort_name: context.cohortName,
    state,
    matrix_id: buildMatrixId(labelName, labelType, window),
    matrix_type: matrixType,
  };

  return applyOverlays(computed, [
    { source: 'window', fields: window },
    { source: 'user', fields: context.userMetadata },
  ]);
}
