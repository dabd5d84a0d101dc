// Set test environment
process.env.NODE_ENV = 'test';
process.env.MONGODB_URI = '';

// File-backed tests touch the disk; keep a margin over the default
jest.setTimeout(15000);
