import 'dotenv/config';
import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  schema: './src/database/schema.ts',
  out: './migrations',
  dialect: 'sqlite',
  dbCredentials: {
    url: process.env.DATABASE_URI ?? './data/planboard.db',
  },
  migrations: {
    table: '__planboard_migrations',
  },
  verbose: true,
  strict: true,
});
