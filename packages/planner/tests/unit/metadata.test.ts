/**
 * Metadata synthesis tests
 */

import { describe, it, expect } from 'vitest';
import type { TemporalWindow } from '@matrixplan/core';
import {
  DEFAULT_LABEL_TIMESPAN,
  applyOverlays,
  buildMatrixId,
  formatTimestamp,
  resolveAsOfDateFrequency,
  resolveLabelTimespan,
  synthesizeMatrixMetadata,
  type MatrixCombination,
  type MetadataContext,
} from '../../src/metadata.js';
import { firstTestWindow, trainWindow } from '../fixtures/matrix-sets.js';

const combination: MatrixCombination = {
  featureDictionary: { tableA: ['f1', 'f2'], tableB: ['f3'] },
  labelName: 'outcome',
  labelType: 'binary',
  state: 'active',
};

const context: MetadataContext = {
  featureStartTime: '2010-01-01',
  cohortName: 'default',
  userMetadata: {},
};

const bareWindow: TemporalWindow = {
  first_as_of_time: '2016-01-01',
  matrix_info_end_time: '2016-02-01',
  as_of_times: ['2016-01-01'],
};

describe('synthesizeMatrixMetadata', () => {
  it('should build the full record for a train window', () => {
    const metadata = synthesizeMatrixMetadata(trainWindow, combination, 'train', context);

    expect(metadata).toEqual({
      feature_start_time: '2010-01-01',
      end_time: '2015-06-01',
      as_of_date_frequency: '2 months',
      indices: ['entity_id', 'as_of_date'],
      feature_names: ['f1', 'f2', 'f3'],
      feature_groups: ['tableA', 'tableB'],
      label_name: 'outcome',
      label_type: 'binary',
      label_timespan: '1 month',
      cohort_name: 'default',
      state: 'active',
      matrix_id: 'outcome_binary_2015-01-01_2015-06-01',
      matrix_type: 'train',
      first_as_of_time: '2015-01-01',
      matrix_info_end_time: '2015-06-01',
      as_of_times: ['2015-01-01', '2015-03-01', '2015-05-01'],
      training_as_of_date_frequency: '2 months',
      training_label_timespan: '1 month',
      max_training_history: '6 months',
    });
  });

  it('should tag test records and use the test frequency', () => {
    const metadata = synthesizeMatrixMetadata(firstTestWindow, combination, 'test', context);

    expect(metadata.matrix_type).toBe('test');
    expect(metadata.as_of_date_frequency).toBe('1 month');
    expect(metadata.matrix_id).toBe('outcome_binary_2015-06-01_2015-07-01');
  });

  it('should omit the as-of-date frequency when the window has none', () => {
    const metadata = synthesizeMatrixMetadata(bareWindow, combination, 'train', context);

    expect(Object.keys(metadata)).not.toContain('as_of_date_frequency');
    expect(metadata.label_timespan).toBe('0 days');
  });

  it('should let window fields overwrite computed fields', () => {
    const metadata = synthesizeMatrixMetadata(
      { ...bareWindow, state: 'window_state' },
      combination,
      'train',
      context
    );

    expect(metadata.state).toBe('window_state');
  });

  it('should let user metadata overwrite window and computed fields', () => {
    const metadata = synthesizeMatrixMetadata(trainWindow, combination, 'train', {
      ...context,
      userMetadata: { max_training_history: '1 year', label_timespan: '2 years', team: 'research' },
    });

    expect(metadata.max_training_history).toBe('1 year');
    expect(metadata.label_timespan).toBe('2 years');
    expect(metadata.team).toBe('research');
  });

  it('should carry the cohort name and feature start time from the context', () => {
    const metadata = synthesizeMatrixMetadata(bareWindow, combination, 'test', {
      ...context,
      cohortName: 'permits_cohort',
      featureStartTime: '2012-01-01',
    });

    expect(metadata.cohort_name).toBe('permits_cohort');
    expect(metadata.feature_start_time).toBe('2012-01-01');
  });

  it('should not share the index list between records', () => {
    const first = synthesizeMatrixMetadata(bareWindow, combination, 'train', context);
    const second = synthesizeMatrixMetadata(bareWindow, combination, 'train', context);

    expect(first.indices).toEqual(second.indices);
    expect(first.indices).not.toBe(second.indices);
  });
});

describe('resolveLabelTimespan', () => {
  it('should prefer the test timespan even for train records', () => {
    expect(
      resolveLabelTimespan({
        ...bareWindow,
        test_label_timespan: '3 months',
        training_label_timespan: '1 month',
      })
    ).toBe('3 months');
  });

  it('should fall back to the training timespan', () => {
    expect(resolveLabelTimespan({ ...bareWindow, training_label_timespan: '1 month' })).toBe(
      '1 month'
    );
  });

  it('should default to 0 days', () => {
    expect(resolveLabelTimespan(bareWindow)).toBe(DEFAULT_LABEL_TIMESPAN);
    expect(DEFAULT_LABEL_TIMESPAN).toBe('0 days');
  });
});

describe('resolveAsOfDateFrequency', () => {
  const bothFrequencies: TemporalWindow = {
    ...bareWindow,
    training_as_of_date_frequency: '1 week',
    test_as_of_date_frequency: '1 day',
  };

  it('should prefer the field for the matrix type', () => {
    expect(resolveAsOfDateFrequency(bothFrequencies, 'train')).toBe('1 week');
    expect(resolveAsOfDateFrequency(bothFrequencies, 'test')).toBe('1 day');
  });

  it('should fall back to the other field', () => {
    expect(resolveAsOfDateFrequency({ ...bareWindow, test_as_of_date_frequency: '1 day' }, 'train')).toBe(
      '1 day'
    );
    expect(
      resolveAsOfDateFrequency({ ...bareWindow, training_as_of_date_frequency: '1 week' }, 'test')
    ).toBe('1 week');
  });

  it('should be undefined when neither field is present', () => {
    expect(resolveAsOfDateFrequency(bareWindow, 'test')).toBeUndefined();
  });
});

describe('buildMatrixId', () => {
  it('should join label name, label type, start and end with underscores', () => {
    expect(buildMatrixId('outcome', 'binary', bareWindow)).toBe(
      'outcome_binary_2016-01-01_2016-02-01'
    );
  });

  it('should render Date bounds as UTC timestamps', () => {
    const window: TemporalWindow = {
      first_as_of_time: new Date(Date.UTC(2015, 0, 1)),
      matrix_info_end_time: new Date(Date.UTC(2015, 5, 1, 12, 30)),
      as_of_times: [],
    };

    expect(buildMatrixId('outcome', 'binary', window)).toBe(
      'outcome_binary_2015-01-01 00:00:00_2015-06-01 12:30:00'
    );
  });
});

describe('formatTimestamp', () => {
  it('should pass strings through', () => {
    expect(formatTimestamp('2015-01-01')).toBe('2015-01-01');
  });

  it('should stringify other values', () => {
    expect(formatTimestamp(undefined)).toBe('undefined');
  });
});

describe('applyOverlays', () => {
  it('should skip undefined overlay values', () => {
    const computed = synthesizeMatrixMetadata(bareWindow, combination, 'train', context);

    const record = applyOverlays(computed, [
      { source: 'user', fields: { state: undefined, team: 'research' } },
    ]);

    expect(record.state).toBe('active');
    expect(record.team).toBe('research');
  });

  it('should apply overlays in order', () => {
    const computed = synthesizeMatrixMetadata(bareWindow, combination, 'train', context);

    const record = applyOverlays(computed, [
      { source: 'window', fields: { cohort_name: 'from_window' } },
      { source: 'user', fields: { cohort_name: 'from_user' } },
    ]);

    expect(record.cohort_name).toBe('from_user');
  });

  it('should copy nested overlay values', () => {
    const computed = synthesizeMatrixMetadata(bareWindow, combination, 'train', context);
    const tags = ['a'];

    const record = applyOverlays(computed, [{ source: 'user', fields: { tags } }]);
    tags.push('b');

    expect(record.tags).toEqual(['a']);
    expect(record.tags).not.toBe(tags);
  });
});
