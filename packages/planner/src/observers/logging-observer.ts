/**
 * Logging Plan Observer
 *
 * Adapter that writes planner progress through the shared winston logger.
 * Progress goes to info, per-matrix detail to debug.
 */

import type {
  MatrixPlannedEvent,
  MatrixSetStartEvent,
  PlanCompleteEvent,
  PlanObserver,
} from '@matrixplan/core';
import { createLogger, type Logger } from '@matrixplan/utils';

export class LoggingPlanObserver implements PlanObserver {
  private readonly logger: Logger;

  constructor(logger: Logger = createLogger('@matrixplan/planner')) {
    this.logger = logger;
  }

  onMatrixSetStart(event: MatrixSetStartEvent): void {
    this.logger.info('Making plans for matrix set', {
      matrixSetIndex: event.matrixSetIndex,
      trainEndTime: event.matrixSet.train_matrix.matrix_info_end_time,
      testMatrixCount: event.matrixSet.test_matrices.length,
    });
    this.logger.info(
      `Iterating over ${event.labelNameCount} label names, ${event.labelTypeCount} label types, ` +
        `${event.stateCount} states, ${event.featureDictionaryCount} feature dictionaries`,
      { matrixSetIndex: event.matrixSetIndex }
    );
  }

  onMatrixPlanned(event: MatrixPlannedEvent): void {
    const message = event.added
      ? `${event.matrixType} uuid not found in build tasks yet, so added`
      : `${event.matrixType} uuid already found in build tasks`;
    this.logger.debug(message, {
      matrixSetIndex: event.matrixSetIndex,
      matrixUuid: event.matrixUuid,
      matrixType: event.matrixType,
      matrixId: event.metadata.matrix_id,
    });
  }

  onPlanComplete(event: PlanCompleteEvent): void {
    this.logger.info(
      `Planner is finished generating matrix plans. ${event.definitionCount} matrix definitions ` +
        `and ${event.buildTaskCount} unique build tasks found`,
      { definitionCount: event.definitionCount, buildTaskCount: event.buildTaskCount }
    );
  }
}
