export class SchedulerError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A bookkeeping rule was broken (negative capacity, duplicate instance id).
 * Always a bug; fatal to the owning schedule loop only.
 */
export class InvariantViolationError extends SchedulerError {
  constructor(message: string) {
    super(message, "INVARIANT_VIOLATION");
  }
}

export class InfeasiblePlacementError extends SchedulerError {
  constructor(componentName: string, ticks: number) {
    super(
      `No node can host a replica of "${componentName}" (unplaced for ${ticks} ticks)`,
      "INFEASIBLE_PLACEMENT"
    );
  }
}

export class ScheduleNotFoundError extends SchedulerError {
  constructor(scheduleName: string) {
    super(`Schedule "${scheduleName}" not found`, "SCHEDULE_NOT_FOUND");
  }
}

export class ScheduleConflictError extends SchedulerError {
  constructor(message: string) {
    super(message, "SCHEDULE_CONFLICT");
  }
}

export class DescriptorValidationError extends SchedulerError {
  constructor(message: string) {
    super(message, "DESCRIPTOR_VALIDATION");
  }
}
