/**
 * Compile-time cost brands.
 *
 * An operation seeds its result with `$cost(value)` and returns it through
 * `$(bound, ctx)`, which checks the modeled cost against the declared
 * bound and brands the value. A brand admits every level at or below its
 * own, so a `ConstCost<T>` can be passed where a `LogCost<T>` is expected
 * but not the other way round.
 *
 * Brands are phantom: at runtime every value is the plain `T`.
 */

declare const costLevel: unique symbol;

// =============================================================================
// Cost Algebra
// =============================================================================

type Nat = 0 | 1 | 2;

/**
 * Asymptotic cost O(n^p log^l n).
 */
export type Cost = { readonly p: Nat; readonly l: Nat };

export type CostLevel = 'const' | 'log' | 'linear' | 'nlogn';
export type CostBound = 'O(1)' | 'O(log n)' | 'O(n)' | 'O(n log n)';

type LevelOf<B extends CostBound> =
  B extends 'O(1)' ? 'const' :
  B extends 'O(log n)' ? 'log' :
  B extends 'O(n)' ? 'linear' :
  'nlogn';

type CostOf<L extends CostLevel> =
  L extends 'const' ? { p: 0; l: 0 } :
  L extends 'log' ? { p: 0; l: 1 } :
  L extends 'linear' ? { p: 1; l: 0 } :
  { p: 1; l: 1 };

export type C_CONST = CostOf<'const'>;
export type C_LOG = CostOf<'log'>;

type NatLeq<A extends Nat, B extends Nat> =
  A extends B ? true :
  A extends 0 ? true :
  A extends 1 ? (B extends 2 ? true : false) :
  false;

/**
 * `A` grows no faster than `B`: compare the polynomial degree first and the
 * log power only when the degrees match.
 */
export type Leq<A extends Cost, B extends Cost> =
  A['p'] extends B['p'] ? NatLeq<A['l'], B['l']> : NatLeq<A['p'], B['p']>;

type LevelsUpTo<L extends CostLevel> = {
  [K in CostLevel]: Leq<CostOf<K>, CostOf<L>> extends true ? K : never;
}[CostLevel];

// =============================================================================
// Branded Results
// =============================================================================

export type Costed<L extends CostLevel, T> = T & { readonly [costLevel]: LevelsUpTo<L> };

export type ConstCost<T> = Costed<'const', T>;
export type LogCost<T> = Costed<'log', T>;
export type LinearCost<T> = Costed<'linear', T>;
export type NLogNCost<T> = Costed<'nlogn', T>;

// =============================================================================
// Boundaries
// =============================================================================

/**
 * A value paired with its modeled cost. `_cost` is never set.
 */
export type Ctx<C extends Cost, T> = { readonly _cost?: C; readonly value: T };

export function $cost<T>(value: T): Ctx<C_CONST, T> {
  return { value };
}

/**
 * Brand `ctx.value` with `bound`. Rejected at compile time when the modeled
 * cost exceeds the bound.
 */
export function $<B extends CostBound, C extends Cost, T>(
  bound: B,
  ctx: Ctx<C, T> & (Leq<C, CostOf<LevelOf<B>>> extends true ? unknown : never)
): Costed<LevelOf<B>, T>;
export function $(_bound: CostBound, ctx: Ctx<Cost, unknown>): unknown {
  return ctx.value;
}
