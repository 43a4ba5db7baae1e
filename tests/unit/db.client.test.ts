import { pool, checkConnection, withConnection, withTransaction } from '@fulfillment/shared/src/db/client';
import type { PoolClient } from 'pg';

function fakeClient(queryImpl?: (sql: string) => Promise<unknown>) {
     const query = jest.fn((sql: string) => (queryImpl ? queryImpl(sql) : Promise.resolve({ rows: [] })));
     const release = jest.fn();
     return { client: { query, release } as unknown as PoolClient, query, release };
}

describe('Database Client', () => {
     let connectSpy: jest.SpyInstance;

     afterEach(() => {
          connectSpy.mockRestore();
     });

     describe('checkConnection', () => {
          it('should return true when database is accessible', async () => {
               const fake = fakeClient();
               connectSpy = jest.spyOn(pool, 'connect').mockResolvedValueOnce(fake.client as never);

               await expect(checkConnection()).resolves.toBe(true);
               expect(fake.query).toHaveBeenCalledWith('SELECT 1');
               expect(fake.release).toHaveBeenCalledTimes(1);
          });

          it('should return false when connecting fails', async () => {
               connectSpy = jest
                    .spyOn(pool, 'connect')
                    .mockRejectedValueOnce(new Error('Connection failed') as never);

               await expect(checkConnection()).resolves.toBe(false);
          });

          it('should return false and release the client when the health query fails', async () => {
               const fake = fakeClient(() => Promise.reject(new Error('terminating connection')));
               connectSpy = jest.spyOn(pool, 'connect').mockResolvedValueOnce(fake.client as never);

               await expect(checkConnection()).resolves.toBe(false);
               expect(fake.release).toHaveBeenCalledTimes(1);
          });
     });

     describe('withTransaction', () => {
          it('should execute function within a transaction and commit', async () => {
               const fake = fakeClient();
               connectSpy = jest.spyOn(pool, 'connect').mockResolvedValueOnce(fake.client as never);
               const mockFn = jest.fn().mockResolvedValue('success');

               const result = await withTransaction(mockFn);

               expect(result).toBe('success');
               expect(mockFn).toHaveBeenCalledWith(fake.client);
               expect(fake.query.mock.calls.map(([sql]) => sql)).toEqual(['BEGIN', 'COMMIT']);
               expect(fake.release).toHaveBeenCalledTimes(1);
          });

          it('should rollback, rethrow and release on error', async () => {
               const fake = fakeClient();
               connectSpy = jest.spyOn(pool, 'connect').mockResolvedValueOnce(fake.client as never);
               const mockFn = jest.fn().mockRejectedValue(new Error('Transaction failed'));

               await expect(withTransaction(mockFn)).rejects.toThrow('Transaction failed');

               expect(fake.query.mock.calls.map(([sql]) => sql)).toEqual(['BEGIN', 'ROLLBACK']);
               expect(fake.release).toHaveBeenCalledTimes(1);
          });
     });

     describe('withConnection', () => {
          it('should release the client after the callback', async () => {
               const fake = fakeClient();
               connectSpy = jest.spyOn(pool, 'connect').mockResolvedValueOnce(fake.client as never);

               const result = await withConnection(async () => 42);

               expect(result).toBe(42);
               expect(fake.query).not.toHaveBeenCalled();
               expect(fake.release).toHaveBeenCalledTimes(1);
          });
     });
});
