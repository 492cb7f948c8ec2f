// Shared type definitions
export type Equality<T> = (a: T, b: T) => boolean;

export const strictEquals = <T>(a: T, b: T): boolean => a === b;

export interface Comparable<I> {
  equals(other: I): boolean;
  /** Negative, zero or positive as this orders before, with or after `other`. */
  compareTo(other: I): number;
}
