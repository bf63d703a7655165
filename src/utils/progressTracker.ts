/**
 * @fileoverview Prints per-subject progress of a sequential run as checklist
 * lines, driven by the run's events.
 */

import type { EventEmitter } from "node:events";
import type { ValidationEvents } from "./events.ts";
import type { Logger } from "./logger.ts";

export class SubjectProgressTracker {
  private logger: Logger;
  private total: number;
  private done: number;
  private completion: Promise<ValidationEvents["complete"]>;

  /**
   * @param emitter - Emitter passed to `validate`
   * @param logger - Receives the checklist lines
   */
  constructor(emitter: EventEmitter, logger: Logger) {
    this.logger = logger;
    this.total = 0;
    this.done = 0;

    emitter.on("start", (event: ValidationEvents["start"]) => {
      this.total = event.subjects.length;
      this.logger.checklist(
        event.sequential
          ? `Validating ${this.total} subjects one at a time`
          : "Validating the whole dataset",
      );
    });
    emitter.on("subject-start", (event: ValidationEvents["subject-start"]) => {
      this.logger.checklist(`[ ] ${event.subject} (${event.files} files)`);
    });
    emitter.on(
      "subject-complete",
      (event: ValidationEvents["subject-complete"]) => {
        this.done++;
        this.logger.checklist(
          `[x] ${event.subject}: ${event.issues} issues (${this.done}/${this.total})`,
        );
      },
    );
    this.completion = new Promise((resolve) => {
      emitter.once("complete", (event: ValidationEvents["complete"]) => {
        this.logger.checklist(
          `Validation finished: ${event.issues} errors and warnings`,
        );
        resolve(event);
      });
    });
  }

  /** Subjects completed so far */
  get completed(): number {
    return this.done;
  }

  /** Resolves with the final event of the run */
  waitForCompletion(): Promise<ValidationEvents["complete"]> {
    return this.completion;
  }
}
