import { beforeEach, describe, expect, it, vi } from 'vitest'
import { log } from '../../plumbing/logger.ts'
import { ConnectionError, StatementError } from '../../plumbing/errors.ts'
import {
  describeDrift,
  ensureAbsent,
  ensurePresent,
  getKeyspace,
  reconcileKeyspace,
} from '../reconciler.ts'
import { SELECT_KEYSPACE_QUERY } from '../statements.ts'
import type { KeyspaceDefinition } from '../types.ts'
import { FakeSession, driverError } from './fake-session.ts'

vi.mock('../../plumbing/logger.ts', () => ({
  log: vi.fn(),
}))

const SIMPLE_CREATE =
  "CREATE KEYSPACE foo WITH REPLICATION = { 'class' : 'SimpleStrategy', 'replication_factor' : '1' } AND DURABLE_WRITES = true;"

const simpleFoo: KeyspaceDefinition = {
  name: 'foo',
  topology: 'SimpleStrategy',
  datacenter: 'datacenter1',
  replicationFactor: 1,
  durableWrites: true,
}

describe('Keyspace Reconciler', () => {
  let session: FakeSession

  beforeEach(() => {
    vi.clearAllMocks()
    session = new FakeSession()
  })

  describe('getKeyspace', () => {
    it('should query schema metadata with the name as a bound parameter', async () => {
      const execute = vi.spyOn(session, 'execute')

      await getKeyspace(session, 'foo')

      expect(execute).toHaveBeenCalledWith(SELECT_KEYSPACE_QUERY, ['foo'])
    })

    it('should return undefined when the keyspace does not exist', async () => {
      expect(await getKeyspace(session, 'foo')).toBeUndefined()
    })

    it('should map the metadata row', async () => {
      session.seed(
        'foo',
        {
          class: 'org.apache.cassandra.locator.NetworkTopologyStrategy',
          dc1: '3',
        },
        false,
      )

      expect(await getKeyspace(session, 'foo')).toEqual({
        keyspace_name: 'foo',
        durable_writes: false,
        replication: {
          class: 'org.apache.cassandra.locator.NetworkTopologyStrategy',
          dc1: '3',
        },
      })
    })
  })

  describe('ensurePresent', () => {
    it('should create a missing SimpleStrategy keyspace', async () => {
      const changed = await ensurePresent(session, false, simpleFoo)

      expect(changed).toBe(true)
      expect(session.statements).toEqual([
        SELECT_KEYSPACE_QUERY,
        SIMPLE_CREATE,
        SELECT_KEYSPACE_QUERY,
      ])
    })

    it('should leave an existing keyspace alone', async () => {
      session.seed('foo')

      const changed = await ensurePresent(session, false, simpleFoo)

      expect(changed).toBe(false)
      expect(session.mutations).toEqual([])
    })

    it('should report a change once and then converge', async () => {
      expect(await ensurePresent(session, false, simpleFoo)).toBe(true)
      expect(await ensurePresent(session, false, simpleFoo)).toBe(false)
      expect(session.mutations).toEqual([SIMPLE_CREATE])
    })

    it('should create a NetworkTopologyStrategy keyspace for the datacenter', async () => {
      const changed = await ensurePresent(session, false, {
        ...simpleFoo,
        topology: 'NetworkTopologyStrategy',
        datacenter: 'dc1',
        replicationFactor: 3,
      })

      expect(changed).toBe(true)
      expect(session.mutations).toEqual([
        "CREATE KEYSPACE foo WITH REPLICATION = { 'class' : 'NetworkTopologyStrategy', 'dc1' : '3' } AND DURABLE_WRITES = true;",
      ])
      expect(session.keyspaces.get('foo')?.replication).toEqual({
        class: 'org.apache.cassandra.locator.NetworkTopologyStrategy',
        dc1: '3',
      })
    })

    it('should report a pending create without issuing it in check mode', async () => {
      const changed = await ensurePresent(session, true, simpleFoo)

      expect(changed).toBe(true)
      expect(session.statements).toEqual([SELECT_KEYSPACE_QUERY])
      expect(session.keyspaces.has('foo')).toBe(false)
    })

    it('should report no change in check mode when the keyspace exists', async () => {
      session.seed('foo')

      expect(await ensurePresent(session, true, simpleFoo)).toBe(false)
      expect(session.mutations).toEqual([])
    })

    it('should log drift without correcting it', async () => {
      session.seed('foo', {
        class: 'org.apache.cassandra.locator.SimpleStrategy',
        replication_factor: '3',
      })

      const changed = await ensurePresent(session, false, simpleFoo)

      expect(changed).toBe(false)
      expect(session.mutations).toEqual([])
      expect(log).toHaveBeenCalledWith({
        message: 'Keyspace exists with different settings, leaving unchanged',
        keyspace: 'foo',
        drift: ['replication_factor is 3'],
      })
    })

    it('should return false when the created keyspace is not yet visible', async () => {
      session.hideCreatedKeyspaces = true

      const changed = await ensurePresent(session, false, simpleFoo)

      expect(changed).toBe(false)
      expect(session.mutations).toEqual([SIMPLE_CREATE])
    })

    it('should quote mixed-case names so the existence check keeps matching', async () => {
      const definition = { ...simpleFoo, name: 'Orders' }

      expect(await ensurePresent(session, false, definition)).toBe(true)
      expect(await ensurePresent(session, false, definition)).toBe(false)
      expect(session.mutations).toEqual([
        `CREATE KEYSPACE "Orders" WITH REPLICATION = { 'class' : 'SimpleStrategy', 'replication_factor' : '1' } AND DURABLE_WRITES = true;`,
      ])
    })

    it('should raise a ConnectionError when the metadata query cannot run', async () => {
      session.failOn(
        (query) => query === SELECT_KEYSPACE_QUERY,
        driverError('NoHostAvailableError', 'All host(s) tried for query failed'),
      )

      const attempt = ensurePresent(session, false, simpleFoo)

      await expect(attempt).rejects.toBeInstanceOf(ConnectionError)
      await expect(attempt).rejects.toThrow('All host(s) tried for query failed')
    })

    it('should raise a StatementError when the create is rejected', async () => {
      session.failOn(
        (query) => query.startsWith('CREATE KEYSPACE'),
        driverError('ResponseError', 'Unrecognized strategy option'),
      )

      const error = await ensurePresent(session, false, simpleFoo).catch(
        (caught: unknown) => caught,
      )

      expect(error).toBeInstanceOf(StatementError)
      expect(error).toMatchObject({
        message: 'Unrecognized strategy option',
        statement: SIMPLE_CREATE,
      })
    })

    it('should reject an invalid definition in check mode without a mutation', async () => {
      await expect(
        ensurePresent(session, true, { ...simpleFoo, replicationFactor: 0 }),
      ).rejects.toThrow('replication_factor must be a positive integer')
      expect(session.mutations).toEqual([])
    })
  })

  describe('ensureAbsent', () => {
    it('should drop an existing keyspace', async () => {
      session.seed('foo')

      const changed = await ensureAbsent(session, false, 'foo')

      expect(changed).toBe(true)
      expect(session.mutations).toEqual(['DROP KEYSPACE foo'])
      expect(session.keyspaces.has('foo')).toBe(false)
    })

    it('should not issue a drop for a missing keyspace', async () => {
      const changed = await ensureAbsent(session, false, 'foo')

      expect(changed).toBe(false)
      expect(session.statements).toEqual([SELECT_KEYSPACE_QUERY])
    })

    it('should report a pending drop without issuing it in check mode', async () => {
      session.seed('foo')

      const changed = await ensureAbsent(session, true, 'foo')

      expect(changed).toBe(true)
      expect(session.mutations).toEqual([])
      expect(session.keyspaces.has('foo')).toBe(true)
    })

    it('should raise a StatementError when the drop is rejected', async () => {
      session.seed('foo')
      session.failOn(
        (query) => query.startsWith('DROP KEYSPACE'),
        driverError('ResponseError', 'User cassandra has no DROP permission'),
      )

      await expect(ensureAbsent(session, false, 'foo')).rejects.toBeInstanceOf(
        StatementError,
      )
    })
  })

  describe('reconcileKeyspace', () => {
    it('should never issue a mutation in check mode', async () => {
      session.seed('bar')

      await reconcileKeyspace(
        session,
        { state: 'present', keyspace: simpleFoo },
        true,
      )
      await reconcileKeyspace(session, { state: 'absent', name: 'bar' }, true)

      expect(session.mutations).toEqual([])
    })

    it('should dispatch on the desired state', async () => {
      expect(
        await reconcileKeyspace(
          session,
          { state: 'present', keyspace: simpleFoo },
          false,
        ),
      ).toBe(true)
      expect(
        await reconcileKeyspace(session, { state: 'absent', name: 'foo' }, false),
      ).toBe(true)
      expect(session.mutations).toEqual([SIMPLE_CREATE, 'DROP KEYSPACE foo'])
    })
  })

  describe('describeDrift', () => {
    it('should list topology and missing datacenter factor', () => {
      const drift = describeDrift(
        {
          keyspace_name: 'foo',
          durable_writes: true,
          replication: {
            class: 'org.apache.cassandra.locator.SimpleStrategy',
            replication_factor: '1',
          },
        },
        {
          ...simpleFoo,
          topology: 'NetworkTopologyStrategy',
          datacenter: 'dc1',
          replicationFactor: 3,
        },
      )

      expect(drift).toEqual(['topology is SimpleStrategy', 'dc1 is unset'])
    })

    it('should report a durable writes mismatch', () => {
      const drift = describeDrift(
        {
          keyspace_name: 'foo',
          durable_writes: false,
          replication: {
            class: 'org.apache.cassandra.locator.SimpleStrategy',
            replication_factor: '1',
          },
        },
        simpleFoo,
      )

      expect(drift).toEqual(['durable_writes is false'])
    })
  })
})
