import 'dotenv/config';
import { defineConfig } from 'drizzle-kit';

// `generate` needs no connection; `migrate` and `studio` fail clearly on an empty URL.
export default defineConfig({
  schema: './src/infrastructure/db/schema.ts',
  out: './db/migrations',
  dialect: 'postgresql',
  dbCredentials: {
    url: process.env.DATABASE_URL ?? '',
  },
});
