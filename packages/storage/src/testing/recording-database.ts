import { SQL } from 'drizzle-orm';
import { PgDialect } from 'drizzle-orm/pg-core';

export type RecordedQueryKind = 'select' | 'insert' | 'update' | 'delete';

export interface RecordedQuery {
  kind: RecordedQueryKind;
  /** Arguments of every builder step, keyed by method name (`from`, `where`, `set`, ...). */
  steps: Record<string, unknown[]>;
  inTransaction: boolean;
}

class RecordedChain implements PromiseLike<unknown[]> {
  constructor(
    private readonly query: RecordedQuery,
    private readonly rows: unknown[]
  ) {}

  private step(name: string, args: unknown[]): this {
    this.query.steps[name] = args;
    return this;
  }

  from(...args: unknown[]): this {
    return this.step('from', args);
  }

  where(...args: unknown[]): this {
    return this.step('where', args);
  }

  orderBy(...args: unknown[]): this {
    return this.step('orderBy', args);
  }

  groupBy(...args: unknown[]): this {
    return this.step('groupBy', args);
  }

  limit(...args: unknown[]): this {
    return this.step('limit', args);
  }

  offset(...args: unknown[]): this {
    return this.step('offset', args);
  }

  values(...args: unknown[]): this {
    return this.step('values', args);
  }

  set(...args: unknown[]): this {
    return this.step('set', args);
  }

  onConflictDoNothing(...args: unknown[]): this {
    return this.step('onConflictDoNothing', args);
  }

  returning(...args: unknown[]): this {
    return this.step('returning', args);
  }

  then<TResult1 = unknown[], TResult2 = never>(
    onfulfilled?: ((value: unknown[]) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): PromiseLike<TResult1 | TResult2> {
    return Promise.resolve(this.rows).then(onfulfilled, onrejected);
  }
}

/**
 * Stand-in for the drizzle client: records each builder chain and answers
 * them, in the order they are started, with the rows queued by `respondWith`.
 */
export class RecordingDatabase {
  readonly queries: RecordedQuery[] = [];
  transactions = 0;
  private readonly pending: unknown[][] = [];
  private inTransaction = false;

  respondWith(...results: unknown[][]): void {
    this.pending.push(...results);
  }

  reset(): void {
    this.queries.length = 0;
    this.pending.length = 0;
    this.transactions = 0;
    this.inTransaction = false;
  }

  select(...args: unknown[]): RecordedChain {
    return this.start('select', args);
  }

  insert(...args: unknown[]): RecordedChain {
    return this.start('insert', args);
  }

  update(...args: unknown[]): RecordedChain {
    return this.start('update', args);
  }

  delete(...args: unknown[]): RecordedChain {
    return this.start('delete', args);
  }

  async transaction<T>(run: (tx: RecordingDatabase) => Promise<T>): Promise<T> {
    this.transactions += 1;
    this.inTransaction = true;
    try {
      return await run(this);
    } finally {
      this.inTransaction = false;
    }
  }

  private start(kind: RecordedQueryKind, args: unknown[]): RecordedChain {
    const query: RecordedQuery = { kind, steps: { [kind]: args }, inTransaction: this.inTransaction };
    this.queries.push(query);
    return new RecordedChain(query, this.pending.shift() ?? []);
  }
}

export const recordingDatabase = new RecordingDatabase();

const dialect = new PgDialect();

/** Renders a recorded drizzle fragment the way it reaches PostgreSQL. */
export const renderSql = (fragment: unknown): { sql: string; params: unknown[] } => {
  if (!(fragment instanceof SQL)) {
    throw new Error('Expected a drizzle SQL fragment');
  }
  const { sql, params } = dialect.sqlToQuery(fragment);
  return { sql, params };
};

export const recordedStep = (query: RecordedQuery | undefined, step: string): unknown => {
  const args = query?.steps[step];
  if (!args) {
    throw new Error(`Query has no ${step} step`);
  }
  return args[0];
};
