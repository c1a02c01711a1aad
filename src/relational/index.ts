/**
 * In-memory relational engine
 *
 * - ZSet: a bag of rows with integer weights
 * - join / leftJoin / antiJoin: equi-joins over Z-sets
 * - groupBy and aggregate folds (SUM, AVG, DISTINCT)
 * - Circuit: a builder for batch dataflow graphs
 */

export * from './zset';
export * from './operators';
export * from './circuit';
