/**
 * Plan Observer Port
 *
 * The planner emits progress through this port instead of logging directly.
 * Adapters (e.g. the logging observer in @matrixplan/planner) implement it.
 * Every hook is optional.
 */

import type { MatrixMetadata, MatrixSetDefinition, MatrixType } from '../matrix/types.js';

export type MatrixSetStartEvent = {
  matrixSetIndex: number;
  matrixSet: MatrixSetDefinition;
  labelNameCount: number;
  labelTypeCount: number;
  stateCount: number;
  featureDictionaryCount: number;
};

export type MatrixPlannedEvent = {
  matrixSetIndex: number;
  matrixType: MatrixType;
  matrixUuid: string;
  metadata: MatrixMetadata;
  /**
   * True when this matrix created a new build task, false when an existing
   * task with the same UUID was reused
   */
  added: boolean;
};

export type PlanCompleteEvent = {
  definitionCount: number;
  buildTaskCount: number;
};

export interface PlanObserver {
  onMatrixSetStart?(event: MatrixSetStartEvent): void;
  onMatrixPlanned?(event: MatrixPlannedEvent): void;
  onPlanComplete?(event: PlanCompleteEvent): void;
}

export const noopPlanObserver: PlanObserver = {};
