import { describeValue, type Value } from './value';

/**
 * Raised when a typed accessor finds a value of another case
 * This is a programmer error (schema and provider disagree), not bad runtime data
 */
export class TypeMismatchError extends Error {
  constructor(
    readonly index: number,
    readonly expected: string,
    readonly actual: Value,
  ) {
    super(`Expected \`${expected}\` value at index ${index}, got ${describeValue(actual)}`);
    this.name = 'TypeMismatchError';
  }
}

/**
 * Decides what a typed accessor does on a type mismatch
 * Injected into rows so both behaviours can run in the same process
 */
export interface TypeMismatchPolicy {
  readonly name: string;
  onMismatch(index: number, expected: string, actual: Value): void;
}

/**
 * Development behaviour: fail loudly with the index, expected type and stored case
 */
export const strictAccess: TypeMismatchPolicy = {
  name: 'strict',
  onMismatch(index, expected, actual) {
    throw new TypeMismatchError(index, expected, actual);
  },
};

/**
 * Production behaviour: the accessor yields no value and ingestion keeps running
 */
export const lenientAccess: TypeMismatchPolicy = {
  name: 'lenient',
  onMismatch() {},
};

let processPolicy: TypeMismatchPolicy | undefined;

/**
 * Override the policy used by rows created without one
 * Pass undefined to go back to the environment-derived default
 */
export function setDefaultAccessPolicy(policy: TypeMismatchPolicy | undefined): void {
  processPolicy = policy;
}

/**
 * Policy for rows without an explicit one
 * Strict everywhere except NODE_ENV=production
 */
export function defaultAccessPolicy(): TypeMismatchPolicy {
  if (processPolicy) {
    return processPolicy;
  }
  return process.env.NODE_ENV === 'production' ? lenientAccess : strictAccess;
}

/**
 * Resolve a policy from its configured name
 */
export function accessPolicyFromName(name: string | undefined): TypeMismatchPolicy | undefined {
  switch (name?.toLowerCase()) {
    case 'strict':
      return strictAccess;
    case 'lenient':
      return lenientAccess;
    default:
      return undefined;
  }
}
