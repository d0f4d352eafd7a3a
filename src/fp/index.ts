/**
 * Small functional helpers shared across the codebase
 */

/**
 * Curried map, data-last so it composes with pipe
 */
export const map =
  <T, U>(fn: (item: T, index: number) => U) =>
  (items: readonly T[]): U[] =>
    items.map(fn);

/**
 * Curried reduce with an initial value
 */
export const reduce =
  <T, U>(fn: (acc: U, item: T) => U, initial: U) =>
  (items: readonly T[]): U =>
    items.reduce(fn, initial);

/** Sum a numeric projection of each item */
export const sumBy = <T>(fn: (item: T) => number): ((items: readonly T[]) => number) =>
  reduce((acc: number, item: T) => acc + fn(item), 0);

/** Drop falsy entries (false, null, undefined, "") */
export const compact = <T>(
  items: readonly (T | false | null | undefined | "")[],
): T[] =>
  items.filter((item): item is T =>
    item !== false && item !== null && item !== undefined && item !== ""
  );

/**
 * Lazily created value with an override setter.
 * The getter builds the value on first use; passing null to the setter
 * clears it so the next get rebuilds.
 */
export const lazyRef = <T>(
  create: () => T,
): [() => T, (value: T | null) => void] => {
  let ref: T | null = null;
  const get = (): T => {
    if (ref === null) ref = create();
    return ref;
  };
  const set = (value: T | null): void => {
    ref = value;
  };
  return [get, set];
};
