/**
 * Circuit - a builder for batch dataflow graphs over Z-sets
 *
 * A Circuit manages:
 * - Input sources (one Z-set per input per step)
 * - Operators (transformations)
 * - Output sinks (where results go)
 *
 * Operators run in topological order and each one finishes before any
 * consumer reads its output, so a join always sees complete inputs.
 * Nothing is carried between steps: a step is a pure function of the
 * Z-sets fed into it.
 */

import type { Logger } from 'pino';
import { ZSet, join as zsetJoin, leftJoin as zsetLeftJoin, antiJoin as zsetAntiJoin, type KeyFn } from './zset';
import { groupBy } from './operators';

export interface CircuitOptions {
  /** Log every operator's output size after each step */
  debug?: boolean;
  logger?: Logger;
}

/**
 * A handle to a stream within a circuit
 */
export class StreamHandle<T> {
  private value: ZSet<T>;

  constructor(
    public readonly id: string,
    protected readonly circuit: Circuit,
    protected readonly keyFn: KeyFn<T> = JSON.stringify
  ) {
    this.value = ZSet.zero(keyFn);
  }

  /** The Z-set this stream carries in the current step */
  current(): ZSet<T> {
    return this.value;
  }

  /** @internal */
  set(value: ZSet<T>): void {
    this.value = value;
  }

  /** Filter operator (linear) */
  filter(predicate: (value: T) => boolean, name?: string): StreamHandle<T> {
    return this.circuit.addOperator<T>(
      name ?? `filter_${this.id}`,
      [this.id],
      () => this.current().filter(predicate),
      this.keyFn
    );
  }

  /** Filter operator with a type guard, narrowing the element type */
  narrow<S extends T>(guard: (value: T) => value is S, name?: string): StreamHandle<S> {
    return this.circuit.addOperator<S>(
      name ?? `narrow_${this.id}`,
      [this.id],
      () => this.current().narrow(guard),
      this.keyFn
    );
  }

  /** Map operator (linear) */
  map<U>(fn: (value: T) => U, keyFn?: KeyFn<U>, name?: string): StreamHandle<U> {
    return this.circuit.addOperator<U>(
      name ?? `map_${this.id}`,
      [this.id],
      () => this.current().map(fn, keyFn),
      keyFn
    );
  }

  /**
   * GROUP BY key with one output row per non-empty group.
   *
   * The output holds at most one row per key, so it can be joined into a
   * one-row-per-key relation without multiplying it.
   */
  aggregate<K, R>(
    keyFn: (value: T) => K,
    reduce: (key: K, rows: ZSet<T>) => R,
    name?: string
  ): StreamHandle<R> {
    return this.circuit.addOperator<R>(
      name ?? `aggregate_${this.id}`,
      [this.id],
      () => {
        const result = ZSet.zero<R>();
        for (const { key, rows } of groupBy(this.current(), keyFn, JSON.stringify, this.keyFn)) {
          result.insert(reduce(key, rows), 1);
        }
        return result;
      }
    );
  }

  /** Inner equi-join with another stream */
  join<U, K>(
    other: StreamHandle<U>,
    keyA: (value: T) => K,
    keyB: (value: U) => K,
    name?: string
  ): StreamHandle<[T, U]> {
    return this.circuit.addOperator<[T, U]>(
      name ?? `join_${this.id}_${other.id}`,
      [this.id, other.id],
      () => zsetJoin(this.current(), other.current(), keyA, keyB),
      ([x, y]) => JSON.stringify([x, y])
    );
  }

  /** Left-outer equi-join: unmatched rows pair with null */
  leftJoin<U, K>(
    other: StreamHandle<U>,
    keyA: (value: T) => K,
    keyB: (value: U) => K,
    name?: string
  ): StreamHandle<[T, U | null]> {
    return this.circuit.addOperator<[T, U | null]>(
      name ?? `leftJoin_${this.id}_${other.id}`,
      [this.id, other.id],
      () => zsetLeftJoin(this.current(), other.current(), keyA, keyB),
      ([x, y]) => JSON.stringify([x, y])
    );
  }

  /** Rows of this stream with no key match in `other` */
  antiJoin<U, K>(
    other: StreamHandle<U>,
    keyA: (value: T) => K,
    keyB: (value: U) => K,
    name?: string
  ): StreamHandle<T> {
    return this.circuit.addOperator<T>(
      name ?? `antiJoin_${this.id}_${other.id}`,
      [this.id, other.id],
      () => zsetAntiJoin(this.current(), other.current(), keyA, keyB),
      this.keyFn
    );
  }

  /** Add an output sink, called once per step */
  output(callback: (value: ZSet<T>) => void): void {
    this.circuit.addOutput(this.id, () => callback(this.current()));
  }

  /** Collect each step's rows (expanded by multiplicity) */
  collect(): T[][] {
    const results: T[][] = [];
    this.output((value) => results.push(value.toArray()));
    return results;
  }
}

/**
 * An input source. Rows fed before a step are consumed by that step.
 */
export class InputHandle<T> extends StreamHandle<T> {
  private pending: ZSet<T> | null = null;

  feed(rows: Iterable<T> | ZSet<T>): void {
    this.pending = rows instanceof ZSet ? rows : ZSet.fromValues(rows, this.keyFn);
  }

  /** @internal */
  load(): void {
    this.set(this.pending ?? ZSet.zero(this.keyFn));
    this.pending = null;
  }
}

interface OperatorNode {
  id: string;
  inputIds: string[];
  run: () => void;
  size: () => number;
}

interface OutputSink {
  streamId: string;
  emit: () => void;
}

/**
 * Circuit - builds and executes dataflow graphs
 */
export class Circuit {
  private inputs = new Map<string, { load(): void }>();
  private operators = new Map<string, OperatorNode>();
  private outputs: OutputSink[] = [];
  private executionOrder: string[] = [];
  private stepCount = 0;
  private readonly debug: boolean;
  private readonly logger?: Logger;

  constructor(options: CircuitOptions = {}) {
    this.debug = options.debug ?? false;
    this.logger = options.logger;
  }

  /**
   * Create an input source for the circuit
   */
  input<T>(id: string, keyFn?: KeyFn<T>): InputHandle<T> {
    this.assertUnusedId(id);
    const handle = new InputHandle<T>(id, this, keyFn);
    this.inputs.set(id, handle);
    return handle;
  }

  /**
   * Add an operator to the circuit (internal)
   */
  addOperator<O>(
    id: string,
    inputIds: string[],
    compute: () => ZSet<O>,
    keyFn?: KeyFn<O>
  ): StreamHandle<O> {
    this.assertUnusedId(id);
    for (const inputId of inputIds) {
      if (!this.inputs.has(inputId) && !this.operators.has(inputId)) {
        throw new Error(`Operator ${id} reads unknown stream ${inputId}`);
      }
    }

    const handle = new StreamHandle<O>(id, this, keyFn);
    this.operators.set(id, {
      id,
      inputIds,
      run: () => handle.set(compute()),
      size: () => handle.current().size(),
    });
    this.updateExecutionOrder();
    return handle;
  }

  /**
   * Add an output sink (internal)
   */
  addOutput(streamId: string, emit: () => void): void {
    this.outputs.push({ streamId, emit });
  }

  private assertUnusedId(id: string): void {
    if (this.inputs.has(id) || this.operators.has(id)) {
      throw new Error(`Stream id ${id} is already defined in this circuit`);
    }
  }

  /**
   * Update topological execution order
   */
  private updateExecutionOrder(): void {
    const visited = new Set<string>();
    const order: string[] = [];

    const visit = (id: string) => {
      if (visited.has(id)) return;
      visited.add(id);

      const op = this.operators.get(id);
      if (op) {
        for (const inputId of op.inputIds) {
          visit(inputId);
        }
        order.push(id);
      }
    };

    for (const id of this.operators.keys()) {
      visit(id);
    }

    this.executionOrder = order;
  }

  /** Operator ids in the order a step runs them */
  getExecutionOrder(): string[] {
    return [...this.executionOrder];
  }

  /**
   * Process one step: consume fed inputs, run every operator, call sinks
   */
  step(): void {
    for (const input of this.inputs.values()) {
      input.load();
    }

    for (const id of this.executionOrder) {
      const op = this.operators.get(id);
      if (!op) continue;
      op.run();
      if (this.debug) {
        this.logger?.debug({ operator: op.id, rows: op.size(), step: this.stepCount }, 'operator finished');
      }
    }

    for (const sink of this.outputs) {
      sink.emit();
    }

    this.stepCount++;
  }

  getStepCount(): number {
    return this.stepCount;
  }
}
