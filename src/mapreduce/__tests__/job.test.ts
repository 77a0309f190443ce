/**
 * Tests for the Map/Reduce job builder
 */

import { describe, expect, it, vi } from 'vitest';
import { ConfigurationError, InvalidStateError, TransportError } from '../../errors.js';
import type { Logger } from '../../observability/types.js';
import { createMockClient } from '../../simulation/mock-client.js';

function setup(logger?: Logger) {
  return createMockClient({ clientId: 'test-client' }, logger);
}

function parseBody(body: string | undefined): unknown {
  return JSON.parse(body ?? 'null');
}

describe('MapReduceJob', () => {
  describe('state', () => {
    it('should move from empty to accumulating to finalized', async () => {
      const { client, transport } = setup();
      transport.replyJson(200, []);

      const job = client.addBucket('orders');
      expect(job.state).toBe('empty');

      job.map('Riak.mapValuesJson');
      expect(job.state).toBe('accumulating');

      await job.run();
      expect(job.state).toBe('finalized');
    });

    it('should reject mutations after run', async () => {
      const { client, transport } = setup();
      transport.replyJson(200, []);
      const job = client.addBucket('orders').map('Riak.mapValuesJson');

      await job.run();

      expect(() => job.reduce('Riak.reduceSum')).toThrow(InvalidStateError);
      expect(() => job.reduce('Riak.reduceSum')).toThrow(
        'Cannot add a phase: Map/Reduce job has already been run'
      );
      expect(() => job.addBucket('other')).toThrow('Cannot add a bucket input: Map/Reduce job has already been run');
      expect(() => job.keyFilter(['eq', '2024'])).toThrow(InvalidStateError);
    });

    it('should allow a finalized job to run again', async () => {
      const { client, transport } = setup();
      transport.replyJson(200, [1]).replyJson(200, [2]);
      const job = client.addBucket('orders').map('Riak.mapValuesJson');

      await job.run();
      const second = await job.run();

      expect(second).toEqual([{ phaseIndex: 0, kind: 'map', values: [2] }]);
      expect(transport.requests).toHaveLength(2);
    });
  });

  describe('run', () => {
    it('should refuse to run without phases', async () => {
      const { client, transport } = setup();

      await expect(client.addBucket('orders').run()).rejects.toThrow(InvalidStateError);
      await expect(client.addBucket('orders').run()).rejects.toThrow('Map/Reduce job has no phases');
      expect(transport.requests).toHaveLength(0);
    });

    it('should refuse to run without inputs', async () => {
      const { client } = setup();

      await expect(client.addMapPhase({ fn: 'Riak.mapValuesJson' }).run()).rejects.toThrow(
        'Map/Reduce job has no inputs'
      );
    });

    it('should post the job and parse the kept phase', async () => {
      const { client, transport } = setup();
      transport.replyJson(200, [42]);

      const results = await client
        .addBucket('orders')
        .map('Riak.mapValuesJson')
        .reduce(['riak_kv_mapreduce', 'reduce_sum'])
        .run();

      expect(results).toEqual([{ phaseIndex: 1, kind: 'reduce', values: [42] }]);

      const request = transport.lastRequest();
      expect(request?.method).toBe('POST');
      expect(request?.url).toBe('http://127.0.0.1:8098/mapred');
      expect(request?.timeout).toBeUndefined();
      expect(request?.headers['Content-Type']).toBe('application/json');
      expect(request?.headers['X-Riak-ClientId']).toBe('test-client');
      expect(parseBody(request?.body)).toEqual({
        inputs: 'orders',
        query: [
          { map: { language: 'javascript', keep: false, name: 'Riak.mapValuesJson' } },
          { reduce: { language: 'erlang', keep: true, module: 'riak_kv_mapreduce', function: 'reduce_sum' } },
        ],
      });
    });

    it('should send the job timeout and wait a second longer', async () => {
      const { client, transport } = setup();
      transport.replyJson(200, []);

      await client.addBucket('orders').map('Riak.mapValuesJson').run(5000);

      const request = transport.lastRequest();
      expect(request?.timeout).toBe(6000);
      expect(parseBody(request?.body)).toMatchObject({ timeout: 5000 });
    });

    it('should reject a timeout that is not a positive integer', async () => {
      const { client, transport } = setup();
      const job = client.addBucket('orders').map('Riak.mapValuesJson');

      await expect(job.run(0)).rejects.toThrow(ConfigurationError);
      expect(job.state).toBe('accumulating');
      expect(transport.requests).toHaveLength(0);
    });

    it('should return one result per kept phase', async () => {
      const { client, transport } = setup();
      transport.replyJson(200, [[{ name: 'alice' }], [1]]);

      const results = await client
        .addBucket('users')
        .map('Riak.mapValuesJson', { keep: true })
        .reduce('Riak.reduceSum')
        .reduce('Riak.reduceSort', { keep: true })
        .run();

      expect(results).toEqual([
        { phaseIndex: 0, kind: 'map', values: [{ name: 'alice' }] },
        { phaseIndex: 2, kind: 'reduce', values: [1] },
      ]);
    });

    it('should leave the content type to the transport defaults', async () => {
      const { client, transport } = setup();
      transport.replyJson(200, [1]);
      const send = vi.spyOn(transport, 'httpRequest');

      await client.addBucket('orders').map('Riak.mapValuesJson').run();

      expect(send).toHaveBeenCalledWith(
        'POST',
        'http://127.0.0.1:8098/mapred',
        expect.any(String),
        undefined,
        { timeout: undefined }
      );
      const headerNames = Object.keys(transport.lastRequest()?.headers ?? {});
      expect(headerNames.filter((name) => name.toLowerCase() === 'content-type')).toEqual(['Content-Type']);
    });

    it('should return empty results for a job over an empty bucket', async () => {
      const { client, transport } = setup();
      transport.replyJson(200, []);

      const results = await client
        .addBucket('empty')
        .map('Riak.mapValuesJson', { keep: true })
        .reduce('Riak.reduceSum', { keep: true })
        .run();

      expect(results).toEqual([
        { phaseIndex: 0, kind: 'map', values: [] },
        { phaseIndex: 1, kind: 'reduce', values: [] },
      ]);
    });

    it('should leave the job open when it cannot be encoded', async () => {
      const { client, transport } = setup();
      const job = client.addBucket('orders').map('Riak.mapValuesJson', { arg: 10n });

      await expect(job.run()).rejects.toThrow(ConfigurationError);
      await expect(job.run()).rejects.toThrow('Map/Reduce job cannot be encoded as JSON');
      expect(job.state).toBe('accumulating');
      expect(transport.requests).toHaveLength(0);
    });

    it('should fail with the status of a rejected job', async () => {
      const { client, transport } = setup();
      transport.reply(500, '{"error":"map_reduce_error"}');

      const run = client.addBucket('orders').map('Riak.mapValuesJson').run();

      await expect(run).rejects.toBeInstanceOf(TransportError);
      await expect(run).rejects.toMatchObject({
        message: 'Map/Reduce failed with HTTP 500',
        statusCode: 500,
        reason: 'status',
      });
    });

    it('should propagate transport failures', async () => {
      const { client, transport } = setup();
      transport.failConnection();

      await expect(client.addBucket('orders').map('Riak.mapValuesJson').run()).rejects.toMatchObject({
        reason: 'connection',
        message: 'connect ECONNREFUSED',
      });
    });

    it('should log the submission at debug level', async () => {
      const logger: Logger = {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        setLevel: vi.fn(),
      };
      const { client, transport } = setup(logger);
      transport.replyJson(200, []);

      await client.addBucket('orders').map('Riak.mapValuesJson').run();

      expect(logger.debug).toHaveBeenCalledWith('Submitting Map/Reduce job', {
        url: 'http://127.0.0.1:8098/mapred',
        phases: 1,
        input: 'bucket',
      });
    });
  });

  describe('inputs', () => {
    it('should list keys with optional key data', () => {
      const { client } = setup();

      const request = client
        .addKey('users', 'alice')
        .addKey('users', 'bob', { weight: 2 })
        .addKeys([{ bucket: 'admins', key: 'carol' }])
        .map('Riak.mapValuesJson')
        .toRequest();

      expect(request.inputs).toEqual([
        ['users', 'alice'],
        ['users', 'bob', { weight: 2 }],
        ['admins', 'carol'],
      ]);
    });

    it('should replace an earlier bucket input', () => {
      const { client } = setup();

      const request = client.addBucket('a').addBucket('b').map('Riak.mapValuesJson').toRequest();

      expect(request.inputs).toBe('b');
    });

    it('should refuse to mix input kinds', () => {
      const { client } = setup();
      const job = client.addBucket('users');

      expect(() => job.addKey('users', 'alice')).toThrow(InvalidStateError);
      expect(() => job.addKey('users', 'alice')).toThrow('Cannot add keys input: job already has bucket input');
      expect(() => job.setSearchQuery('users', 'name:alice')).toThrow(
        'Cannot add search input: job already has bucket input'
      );
      expect(job.getInput()).toEqual({ kind: 'bucket', bucket: 'users' });
    });

    it('should serialize a search input', () => {
      const { client } = setup();

      const request = client
        .addSearchPhase({ bucket: 'docs', query: 'title:riak' })
        .map('Riak.mapValuesJson')
        .toRequest();

      expect(request.inputs).toEqual({
        module: 'riak_search',
        function: 'mapred_search',
        arg: ['docs', 'title:riak'],
      });
    });

    it('should serialize index match and range inputs', () => {
      const { client } = setup();

      const match = client
        .addIndex({ bucket: 'users', index: 'email_bin', key: 'alice@example.test' })
        .map('Riak.mapValuesJson')
        .toRequest();
      const range = client
        .addIndex({ bucket: 'users', index: 'age_int', start: 20, end: 30 })
        .map('Riak.mapValuesJson')
        .toRequest();

      expect(match.inputs).toEqual({ bucket: 'users', index: 'email_bin', key: 'alice@example.test' });
      expect(range.inputs).toEqual({ bucket: 'users', index: 'age_int', start: 20, end: 30 });
    });
  });

  describe('key filters', () => {
    it('should append filters to a bucket input', () => {
      const { client } = setup();

      const request = client
        .addBucket('invoices')
        .keyFilter(['tokenize', '-', 1])
        .keyFilter(['eq', '2010'])
        .map('Riak.mapValuesJson')
        .toRequest();

      expect(request.inputs).toEqual({
        bucket: 'invoices',
        key_filters: [
          ['tokenize', '-', 1],
          ['eq', '2010'],
        ],
      });
    });

    it('should combine existing filters with and/or', () => {
      const { client } = setup();

      const job = client
        .addBucket('invoices')
        .keyFilter(['ends_with', '0603'])
        .keyFilterAnd(['starts_with', 'basho']);

      expect(job.getKeyFilters()).toEqual([['and', [['ends_with', '0603']], [['starts_with', 'basho']]]]);

      job.keyFilterOr(['eq', 'acme-0603']);

      expect(job.getKeyFilters()).toEqual([
        [
          'or',
          [['and', [['ends_with', '0603']], [['starts_with', 'basho']]]],
          [['eq', 'acme-0603']],
        ],
      ]);
    });

    it('should use the filters directly when there are none yet', () => {
      const { client } = setup();

      const job = client.addBucket('invoices').keyFilterOr(['eq', 'a'], ['eq', 'b']);

      expect(job.getKeyFilters()).toEqual([
        ['eq', 'a'],
        ['eq', 'b'],
      ]);
    });

    it('should require a bucket input', () => {
      const { client } = setup();

      expect(() => client.addKey('users', 'alice').keyFilter(['eq', 'x'])).toThrow(
        'Key filters can only be used with a bucket input'
      );
      expect(() => client.mapReduce().keyFilterAnd(['eq', 'x'])).toThrow(InvalidStateError);
    });
  });

  describe('phases', () => {
    it('should keep insertion order', () => {
      const { client } = setup();

      const request = client
        .addBucket('people')
        .link({ bucket: 'people', tag: 'friend' })
        .map('function(v) { return [v.key]; }', { arg: { depth: 1 } })
        .reduce('Riak.reduceSort', { keep: true })
        .toRequest();

      expect(request.query).toEqual([
        { link: { bucket: 'people', tag: 'friend', keep: false } },
        { map: { language: 'javascript', keep: false, arg: { depth: 1 }, source: 'function(v) { return [v.key]; }' } },
        { reduce: { language: 'javascript', keep: true, name: 'Riak.reduceSort' } },
      ]);
    });

    it('should copy added phases', () => {
      const { client } = setup();
      const phase = { kind: 'link' as const, tag: 'friend' };

      const job = client.mapReduce().addPhase(phase);
      phase.tag = 'enemy';

      expect(job.getPhases()).toEqual([{ kind: 'link', tag: 'friend' }]);
    });
  });
});
