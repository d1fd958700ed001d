// PostgreSQL connection setup for the café schema
// Settings come from the environment, mirroring the export tool's .env

import { Pool, type PoolConfig } from 'pg'

export function resolveConnectionConfig(env: NodeJS.ProcessEnv = process.env): PoolConfig {
  const connectionString = env.DATABASE_URL?.trim()
  if (connectionString) {
    return { connectionString }
  }

  const port = parseInt(env.POSTGRES_PORT || '5432', 10)
  if (Number.isNaN(port)) {
    throw new Error(`Invalid env var: POSTGRES_PORT=${env.POSTGRES_PORT}`)
  }

  return {
    host: env.POSTGRES_HOST || 'localhost',
    port,
    user: env.POSTGRES_USER || 'cafe',
    password: env.POSTGRES_PASSWORD || '',
    database: env.POSTGRES_DB || 'cafe',
  }
}

export function createPool(config: PoolConfig = resolveConnectionConfig()): Pool {
  return new Pool(config)
}

// Connection health check
export const checkConnection = async (pool: Pool): Promise<boolean> => {
  try {
    await pool.query('select 1')
    return true
  } catch {
    return false
  }
}
