/**
 * Element type tokens
 *
 * An element type is the runtime stand-in for `T` in `Matrix<T>`: it names
 * the type, supplies the value fresh cells start with, and recognises values
 * of the type.
 */

export interface ElementType<T> {
  readonly name: string;
  /**
   * Value every freshly allocated cell holds
   */
  readonly zero: T;
  isValidValue(value: unknown): value is T;
}

/**
 * Extract `T` from an `ElementType<T>`
 */
export type ElementOf<E> = E extends ElementType<infer T> ? T : never;

/**
 * Rectangular backing storage: `rows` arrays of exactly `cols` elements
 */
export type Storage<T> = T[][];

/**
 * Allocates zero-filled rectangular storage for an element type
 */
export interface ArrayFactory {
  alloc<T>(elementType: ElementType<T>, rows: number, cols: number): Storage<T>;
}
