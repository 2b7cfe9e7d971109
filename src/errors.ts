/**
 * Contract violations are programming errors on the caller's or the
 * engine's side. Nothing in the engine catches them.
 */
export class ContractViolation extends Error {
  name = "ContractViolation";
}

/** Input that is not a well-formed operation. */
export class MalformedOperation extends ContractViolation {
  name = "MalformedOperation";
}

/** Internal ordering invariant broken, e.g. comparing ops of different entries. */
export class InvariantViolation extends ContractViolation {
  name = "InvariantViolation";
}

export class ConfigError extends Error {
  name = "ConfigError";
}

export function invariant(cond: unknown, msg: string): asserts cond {
  if (!cond) throw new InvariantViolation(msg);
}
