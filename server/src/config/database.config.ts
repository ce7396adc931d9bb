/**
 * Atrium Roomserver - Database Configuration
 *
 * SQLite database holding room aliases, current room state and the
 * roomserver output event stream.
 */

export const databaseConfig = () => ({
  database: {
    path: process.env.DB_PATH || 'roomserver.db',
    walMode: process.env.DB_WAL !== 'false',
  },
});
