/**
 * Internal DX Helper:
 * Flattens the type output to improve tooltips in editors.
 *
 * This forces TypeScript to resolve intersections (A & B) into a single flat
 * object structure, making hover-previews for composed result types readable.
 *
 * @see https://github.com/sindresorhus/type-fest/blob/main/source/simplify.d.ts
 *
 * @example
 * ```ts
 * type A = { x: 1 };
 * type B = { y: 2 };
 *
 * // Without Simplify: Shows "A & B" on hover.
 * type Complex = A & B;
 *
 * // With Simplify: Shows "{ x: 1; y: 2 }" on hover.
 * type Flat = Simplify<A & B>;
 * ```
 */
export type Simplify<T> = { [KeyType in keyof T]: T[KeyType] } & {};
