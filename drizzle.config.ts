import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  schema: './src/storage/drizzle/schema.ts',
  out: './drizzle',
  dialect: 'postgresql',
  dbCredentials: {
    url: process.env['DATABASE_URL'] ?? 'postgres://localhost:5432/auth',
  },
  verbose: true,
  strict: true,
});
