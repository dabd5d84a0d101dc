/**
 * Database Configuration Unit Tests
 *
 * Tests MongoDB connection management for the primary ledger store.
 */

// Mock mongoose
const mockMongooseConnect = jest.fn().mockResolvedValue({ connection: { host: 'localhost' } });
const mockMongooseDisconnect = jest.fn().mockResolvedValue(undefined);
const mockMongooseOn = jest.fn();

const mockMongooseConnection = {
  readyState: 1,
  on: mockMongooseOn,
};

jest.mock('mongoose', () => ({
  connect: mockMongooseConnect,
  disconnect: mockMongooseDisconnect,
  connection: mockMongooseConnection,
}));

// Mock config
jest.mock('../../../src/config/index', () => ({
  config: {
    mongodb: {
      uri: 'mongodb://localhost:27017/budget-ledger-test',
      maxPoolSize: 5,
      serverSelectionTimeoutMS: 5000,
    },
  },
}));

jest.mock('../../../src/observability/logger', () => ({
  createServiceLogger: () => ({
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

describe('Database Configuration', () => {
  let connectDatabase: typeof import('../../../src/config/database').connectDatabase;
  let disconnectDatabase: typeof import('../../../src/config/database').disconnectDatabase;
  let getDatabaseStatus: typeof import('../../../src/config/database').getDatabaseStatus;

  beforeEach(async () => {
    jest.clearAllMocks();
    jest.resetModules();

    const module = await import('../../../src/config/database');
    connectDatabase = module.connectDatabase;
    disconnectDatabase = module.disconnectDatabase;
    getDatabaseStatus = module.getDatabaseStatus;
  });

  const connectionHandler = (event: string): (() => void) => {
    const call = mockMongooseOn.mock.calls.find(([name]) => name === event);
    if (!call) {
      throw new Error(`No handler registered for ${event}`);
    }
    return call[1];
  };

  describe('connectDatabase', () => {
    it('should connect to MongoDB with the pool settings', async () => {
      await connectDatabase();

      expect(mockMongooseConnect).toHaveBeenCalledWith(
        'mongodb://localhost:27017/budget-ledger-test',
        { maxPoolSize: 5, serverSelectionTimeoutMS: 5000 }
      );
    });

    it('should not reconnect if already connected', async () => {
      await connectDatabase();
      jest.clearAllMocks();

      await connectDatabase();

      expect(mockMongooseConnect).not.toHaveBeenCalled();
    });

    it('should throw error on connection failure', async () => {
      mockMongooseConnect.mockRejectedValueOnce(new Error('Connection failed'));

      await expect(connectDatabase()).rejects.toThrow('Connection failed');
      expect(getDatabaseStatus().connected).toBe(false);
    });
  });

  describe('disconnectDatabase', () => {
    it('should disconnect from MongoDB', async () => {
      await connectDatabase();

      await disconnectDatabase();

      expect(mockMongooseDisconnect).toHaveBeenCalled();
      expect(getDatabaseStatus().connected).toBe(false);
    });

    it('should do nothing if not connected', async () => {
      await disconnectDatabase();

      expect(mockMongooseDisconnect).not.toHaveBeenCalled();
    });

    it('should throw error on disconnection failure', async () => {
      await connectDatabase();
      mockMongooseDisconnect.mockRejectedValueOnce(new Error('Disconnect failed'));

      await expect(disconnectDatabase()).rejects.toThrow('Disconnect failed');
    });
  });

  describe('getDatabaseStatus', () => {
    it('should return connected status after connecting', async () => {
      await connectDatabase();

      expect(getDatabaseStatus()).toEqual({ connected: true, readyState: 1 });
    });

    it('should return disconnected status before connecting', () => {
      expect(getDatabaseStatus().connected).toBe(false);
    });

    it('should follow connection events', async () => {
      await connectDatabase();

      connectionHandler('disconnected')();
      expect(getDatabaseStatus().connected).toBe(false);

      connectionHandler('reconnected')();
      expect(getDatabaseStatus().connected).toBe(true);
    });
  });
});
