import { describe, it, expect, vi } from 'vitest';
import { MultiIndexQuery } from '../../src/query/builder.js';
import type { RunState } from '../../src/query/builder.js';
import { InvalidOperatorError } from '../../src/errors.js';
import { DEFAULT_TIMEOUT_MS, INT_INDEX_MAX } from '../../src/config.js';
import type { ResultTuple } from '../../src/types.js';
import { BUCKET, collect, makeRecordingClient } from './helpers.js';

function makeQuery(client = makeRecordingClient()) {
  return new MultiIndexQuery({ client, bucket: BUCKET });
}

describe('MultiIndexQuery', () => {

  // ---------------------------------------------------------------------------
  // Chaining and state
  // ---------------------------------------------------------------------------
  describe('builder state', () => {
    it('starts empty', () => {
      expect(makeQuery().state).toEqual({ bucket: BUCKET, filters: [], order: null, offset: 0, limit: 0 });
    });

    it('every builder call returns the same instance', () => {
      const query = makeQuery();
      expect(query.filter('age', '<', 50)).toBe(query);
      expect(query.offset(1)).toBe(query);
      expect(query.limit(2)).toBe(query);
      expect(query.order('age')).toBe(query);
      expect(query.reset()).toBe(query);
    });

    it('records filters in insertion order without validating them', () => {
      const query = makeQuery().filter('age', '<', 50).filter('name', '!=', 'x');
      expect(query.state.filters).toEqual([
        { field: 'age', op: '<', value: 50 },
        { field: 'name', op: '!=', value: 'x' },
      ]);
    });

    it('order defaults to ASC and the last call wins', () => {
      const query = makeQuery().order('age');
      expect(query.state.order).toEqual({ field: 'age', direction: 'ASC' });
      query.order('name', 'DESC');
      expect(query.state.order).toEqual({ field: 'name', direction: 'DESC' });
    });

    it('limit() with no argument means unbounded', () => {
      expect(makeQuery().limit(5).limit().state.limit).toBe(0);
    });

    it('accepts a negative offset as given', () => {
      expect(makeQuery().offset(-3).state.offset).toBe(-3);
    });

    it('state is a snapshot', () => {
      const query = makeQuery().filter('age', '<', 50);
      const snapshot = query.state;
      query.filter('name', '==', 'Vishnu');
      expect(snapshot.filters).toHaveLength(1);
      expect(Object.isFrozen(snapshot.filters)).toBe(true);
    });

    it('reset() clears filters, order and pagination', () => {
      const query = makeQuery().filter('age', '<', 50).order('age', 'DESC').offset(1).limit(1);
      query.reset();
      expect(query.state).toEqual({ bucket: BUCKET, filters: [], order: null, offset: 0, limit: 0 });
    });
  });

  // ---------------------------------------------------------------------------
  // toString
  // ---------------------------------------------------------------------------
  describe('toString()', () => {
    it('renders an empty query with the order sentinel', () => {
      expect(String(makeQuery())).toBe('MultiIndexQuery(bucket=people).order(none).offset(0).limit(0)');
    });

    it('renders filters, order and pagination', () => {
      const query = makeQuery()
        .filter('age', '<', 50)
        .filter('name', '==', 'Vishnu')
        .order('age', 'DESC')
        .offset(1)
        .limit(2);
      expect(query.toString()).toBe(
        'MultiIndexQuery(bucket=people).filter(age < 50).filter(name == "Vishnu").order(age, DESC).offset(1).limit(2)',
      );
    });
  });

  // ---------------------------------------------------------------------------
  // explain
  // ---------------------------------------------------------------------------
  describe('explain()', () => {
    it('lists lookups, predicate and reduce phases without touching the store', () => {
      const client = makeRecordingClient();
      const plan = makeQuery(client).filter('age', '>', 30).order('age').limit(1).explain();
      expect(plan.lookups).toEqual([
        { kind: 'range', bucket: BUCKET, index: 'age_int', start: 30, end: INT_INDEX_MAX },
      ]);
      expect(plan.predicate).toBe('document.age > 30');
      expect(plan.reduce.map((p) => p.kind)).toEqual(['sort', 'slice']);
      expect(client.lookups).toHaveLength(0);
      expect(client.jobs).toHaveLength(0);
    });

    it('throws InvalidOperatorError for unsupported operators', () => {
      expect(() => makeQuery().filter('age', '!=', 1).explain()).toThrow(InvalidOperatorError);
    });
  });

  // ---------------------------------------------------------------------------
  // run
  // ---------------------------------------------------------------------------
  describe('run()', () => {
    it('does nothing until iterated', () => {
      const client = makeRecordingClient();
      makeQuery(client).filter('age', '<', 50).run();
      expect(client.lookups).toHaveLength(0);
      expect(client.jobs).toHaveLength(0);
    });

    it('submits candidate keys from the index lookups', async () => {
      const client = makeRecordingClient({ age_int: ['sree', 'vishnu'], name_bin: ['vishnu'] });
      await collect(makeQuery(client).filter('age', '<', 50).filter('name', '==', 'Vishnu').run());
      expect(client.jobs).toHaveLength(1);
      expect(client.jobs[0]!.job.input).toEqual({ kind: 'keys', bucket: BUCKET, keys: ['sree', 'vishnu'] });
      expect(client.jobs[0]!.job.map.predicate.expression).toBe('document.age < 50 && document.name == "Vishnu"');
    });

    it('falls back to the whole bucket when lookups return nothing', async () => {
      const client = makeRecordingClient();
      await collect(makeQuery(client).filter('age', '>', 100).run());
      expect(client.jobs[0]!.job.input).toEqual({ kind: 'bucket', bucket: BUCKET });
    });

    it('yields what the job streams back', async () => {
      const results: ResultTuple[] = [['sree', { name: 'Sreejith', age: 25 }]];
      const client = makeRecordingClient({}, results);
      expect(await collect(makeQuery(client).run())).toEqual(results);
    });

    it('uses the configured timeout, overridable per run', async () => {
      const client = makeRecordingClient();
      const query = new MultiIndexQuery({ client, bucket: BUCKET, timeoutMs: 1234 });
      await collect(query.run());
      await collect(query.run(50));
      expect(client.jobs.map((j) => j.options.timeoutMs)).toEqual([1234, 50]);
    });

    it('defaults the timeout to DEFAULT_TIMEOUT_MS', async () => {
      const client = makeRecordingClient();
      await collect(makeQuery(client).run());
      expect(client.jobs[0]!.options.timeoutMs).toBe(DEFAULT_TIMEOUT_MS);
    });

    it('fails with InvalidOperatorError before any lookup is issued', async () => {
      const client = makeRecordingClient();
      const run = makeQuery(client).filter('age', '<', 50).filter('name', 'like', 'V').run();
      await expect(collect(run)).rejects.toThrow(InvalidOperatorError);
      await expect(collect(makeQuery(client).filter('name', 'like', 'V').run())).rejects.toMatchObject({
        operator: 'like',
      });
      expect(client.lookups).toHaveLength(0);
      expect(client.jobs).toHaveLength(0);
    });

    it('is bound to the state at call time', async () => {
      const client = makeRecordingClient();
      const query = makeQuery(client).filter('age', '<', 50);
      const run = query.run();
      query.reset().filter('name', '==', 'Vishnu').limit(1);
      await collect(run);
      expect(client.lookups.map((l) => l.index)).toEqual(['age_int']);
      expect(client.jobs[0]!.job.reduce).toEqual([]);
    });

    it('does not mutate the builder', async () => {
      const query = makeQuery().filter('age', '<', 50).order('age').limit(1);
      const before = query.toString();
      await collect(query.run());
      expect(query.toString()).toBe(before);
    });

    it('reports every state transition in order', async () => {
      const transitions: Array<[RunState, RunState]> = [];
      const onStateChange = vi.fn((from: RunState, to: RunState) => {
        transitions.push([from, to]);
      });
      const query = new MultiIndexQuery({ client: makeRecordingClient(), bucket: BUCKET, onStateChange });
      await collect(query.run());
      expect(transitions).toEqual([
        ['idle', 'lookups-issued'],
        ['lookups-issued', 'candidates-aggregated'],
        ['candidates-aggregated', 'predicate-compiled'],
        ['predicate-compiled', 'job-assembled'],
        ['job-assembled', 'job-submitted'],
        ['job-submitted', 'streaming'],
        ['streaming', 'done'],
      ]);
    });

    it('a failing lookup aborts the run before any job is assembled', async () => {
      const failure = new Error('index unavailable');
      const client = makeRecordingClient();
      client.lookup = () => ({
        [Symbol.asyncIterator]: () => ({ next: () => Promise.reject(failure) }),
      });
      const states: RunState[] = [];
      const query = new MultiIndexQuery({ client, bucket: BUCKET, onStateChange: (_from, to) => states.push(to) });
      await expect(collect(query.filter('age', '<', 50).run())).rejects.toBe(failure);
      expect(client.jobs).toHaveLength(0);
      expect(states).toEqual(['lookups-issued']);
    });

    it('does not report lookups-issued when the store refuses the first lookup', async () => {
      const failure = new Error('bucket missing');
      const client = makeRecordingClient();
      client.lookup = () => {
        throw failure;
      };
      const states: RunState[] = [];
      const query = new MultiIndexQuery({ client, bucket: BUCKET, onStateChange: (_from, to) => states.push(to) });
      await expect(collect(query.filter('age', '<', 50).run())).rejects.toBe(failure);
      expect(states).toEqual([]);
      expect(client.jobs).toHaveLength(0);
    });

    it('propagates job submission failures unchanged', async () => {
      const failure = new Error('mapreduce rejected');
      const client = makeRecordingClient();
      client.submit = () => {
        throw failure;
      };
      await expect(collect(makeQuery(client).run())).rejects.toBe(failure);
    });
  });
});
