import 'reflect-metadata';

// Environment the root module validates when it is imported.
process.env.SERVER_NAME = 'serverA';
process.env.API_SHARED_SECRET = 'test-secret-value';
process.env.DB_PATH = ':memory:';
process.env.FEDERATION_SENDER_URL = 'http://federation-sender.test';
