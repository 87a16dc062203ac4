import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createDeferred } from '../test/mocks.js';
import { createMongoConnection } from './mongo-connection.js';

const driver = vi.hoisted(() => ({
  connect: vi.fn<() => Promise<void>>(),
  close: vi.fn<() => Promise<void>>(),
  collection: vi.fn(),
}));

vi.mock('mongodb', () => ({
  MongoClient: class {
    connect = driver.connect;
    close = driver.close;
    db = () => ({ collection: driver.collection });
  },
}));

const OPTIONS = {
  url: 'mongodb://127.0.0.1:27017',
  dbName: 'gateway',
  collectionName: 'tokens',
};

describe('createMongoConnection', () => {
  beforeEach(() => {
    driver.connect.mockReset().mockResolvedValue(undefined);
    driver.close.mockReset().mockResolvedValue(undefined);
    driver.collection.mockReset().mockReturnValue({});
  });

  it('closes without connecting when never used', async () => {
    const connection = createMongoConnection(OPTIONS);

    await expect(connection.close()).resolves.toBeUndefined();
    expect(driver.connect).not.toHaveBeenCalled();
    expect(driver.close).not.toHaveBeenCalled();
  });

  it('connects once and closes the client', async () => {
    const connection = createMongoConnection(OPTIONS);

    await connection.getCollection();
    await connection.getCollection();
    await connection.close();

    expect(driver.connect).toHaveBeenCalledTimes(1);
    expect(driver.collection).toHaveBeenCalledWith('tokens');
    expect(driver.close).toHaveBeenCalledTimes(1);
  });

  it('closes a client whose connect was still in progress', async () => {
    const connected = createDeferred<undefined>();
    driver.connect.mockReturnValueOnce(connected.promise);
    const connection = createMongoConnection(OPTIONS);

    const collection = connection.getCollection();
    const closing = connection.close();
    connected.resolve(undefined);

    await closing;
    await collection;
    expect(driver.close).toHaveBeenCalledTimes(1);
  });

  it('has nothing to close when the connect in progress fails', async () => {
    const connected = createDeferred<undefined>();
    driver.connect.mockReturnValueOnce(connected.promise);
    const connection = createMongoConnection(OPTIONS);

    const settled = Promise.allSettled([connection.getCollection(), connection.close()]);
    connected.reject(new Error('connection refused'));

    const [collection, closed] = await settled;
    expect(closed).toEqual({ status: 'fulfilled', value: undefined });
    expect(collection).toMatchObject({ status: 'rejected', reason: new Error('connection refused') });
    expect(driver.close).not.toHaveBeenCalled();
  });
});
