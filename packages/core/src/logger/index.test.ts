import { describe, it, expect, afterEach, vi } from 'vitest'
import { createLogger } from './index.js'

afterEach(() => {
  vi.unstubAllEnvs()
})

describe('createLogger', () => {
  it('creates logger with specified level', () => {
    vi.stubEnv('NODE_ENV', 'production')
    const logger = createLogger({ level: 'debug', pretty: false })
    expect(logger.level).toBe('debug')
  })

  it('accepts the silent level', () => {
    vi.stubEnv('NODE_ENV', 'production')
    const logger = createLogger({ level: 'silent', pretty: false })
    expect(logger.level).toBe('silent')
    expect(logger.isLevelEnabled('error')).toBe(false)
  })

  it('child loggers inherit the level', () => {
    vi.stubEnv('NODE_ENV', 'production')
    const logger = createLogger({ level: 'warn', pretty: false })
    const child = logger.child({ batch: 3 })
    expect(child.level).toBe('warn')
  })

  it('logger has standard pino methods', () => {
    vi.stubEnv('NODE_ENV', 'production')
    const logger = createLogger({ level: 'info', pretty: false }, 'seed-test')

    expect(typeof logger.info).toBe('function')
    expect(typeof logger.error).toBe('function')
    expect(typeof logger.warn).toBe('function')
    expect(typeof logger.debug).toBe('function')
    expect(typeof logger.child).toBe('function')
  })
})
