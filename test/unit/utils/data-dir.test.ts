import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

const testDir = dirname(fileURLToPath(import.meta.url))

describe('data-dir', () => {
  const originalEnv = { ...process.env }

  beforeEach(() => {
    vi.resetModules()
    delete process.env.dataDir
  })

  afterEach(() => {
    process.env = { ...originalEnv }
  })

  describe('resolveDataDir', () => {
    it('should return dataDir env var when set', async () => {
      process.env.dataDir = '/custom/data'
      const { resolveDataDir } = await import('@utils/data-dir.js')
      expect(resolveDataDir()).toBe(resolve('/custom/data'))
    })

    it('should fall back to the data folder in the project root', async () => {
      const { resolveDataDir, projectRoot } = await import('@utils/data-dir.js')
      expect(resolveDataDir()).toBe(resolve(projectRoot, 'data'))
    })
  })

  describe('projectRoot', () => {
    it('should point at the directory holding package.json', async () => {
      const { projectRoot } = await import('@utils/data-dir.js')
      expect(projectRoot).toBe(resolve(testDir, '..', '..', '..'))
    })
  })

  describe('resolveDbPath', () => {
    it('should use dataDir when available', async () => {
      process.env.dataDir = '/custom/data'
      const { resolveDbPath } = await import('@utils/data-dir.js')
      expect(resolveDbPath()).toBe(resolve('/custom/data', 'db'))
    })
  })

  describe('resolveLogPath', () => {
    it('should use dataDir when available', async () => {
      process.env.dataDir = '/custom/data'
      const { resolveLogPath } = await import('@utils/data-dir.js')
      expect(resolveLogPath()).toBe(resolve('/custom/data', 'logs'))
    })
  })

  describe('resolveEnvPath', () => {
    it('should resolve .env in the working directory', async () => {
      process.env.dataDir = '/custom/data'
      const { resolveEnvPath } = await import('@utils/data-dir.js')
      expect(resolveEnvPath()).toBe(resolve(process.cwd(), '.env'))
    })
  })

  describe('resolveMigrationsDir', () => {
    it('should resolve migrations/migrations under the project root', async () => {
      const { resolveMigrationsDir, projectRoot } = await import(
        '@utils/data-dir.js'
      )
      expect(resolveMigrationsDir()).toBe(
        resolve(projectRoot, 'migrations', 'migrations'),
      )
    })
  })
})
