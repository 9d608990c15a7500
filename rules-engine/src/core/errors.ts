/**
 * core/errors.ts
 *
 * Structural faults raised by the engine. Expected outcomes such as an
 * invalid target are reported as ResolutionResult values instead; these
 * errors abort the in-flight top-level action and surface to the host.
 */

export class EngineFault extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A model invariant was broken, e.g. a card already present in the
 * target zone or a pop on an empty resolution stack.
 */
export class InvariantViolationError extends EngineFault {}

/**
 * A resolver ran without something it cannot work without, such as the
 * chain session or a mandatory collaborator.
 */
export class PreconditionError extends EngineFault {}

export class EventRecursionError extends EngineFault {
  constructor(
    message: string,
    readonly eventType: string,
    readonly depth: number
  ) {
    super(message);
  }
}
