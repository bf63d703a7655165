import type { EventEmitter } from "node:events";

/** Payloads of the events a validation run emits */
export interface ValidationEvents {
  start: { sequential: boolean; subjects: string[] };
  "subject-start": { subject: string; files: number };
  "subject-complete": { subject: string; issues: number };
  complete: { valid: boolean; issues: number };
}

export type ValidationEventName = keyof ValidationEvents;

/**
 * Emits a validation event when an emitter is attached
 */
export function emitEvent<K extends ValidationEventName>(
  emitter: EventEmitter | undefined,
  name: K,
  payload: ValidationEvents[K],
): void {
  emitter?.emit(name, payload);
}
