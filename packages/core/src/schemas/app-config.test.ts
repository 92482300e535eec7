import { describe, it, expect } from 'vitest'
import { AppConfigSchema, DEFAULTS } from './app-config.js'

describe('AppConfigSchema', () => {
  it('fills every section from defaults', () => {
    const config = AppConfigSchema.parse({})

    expect(config.server).toEqual(DEFAULTS.server)
    expect(config.sync.cursorFile).toBe('.sync_cursor')
    expect(config.build.timeoutMs).toBe(600_000)
    expect(config.copyRules).toHaveLength(1)
  })

  it('defaults recursive to false on copy rules', () => {
    const config = AppConfigSchema.parse({
      copyRules: [{ source: 'public/*.html', destination: 'out' }],
    })

    expect(config.copyRules).toEqual([
      { source: 'public/*.html', destination: 'out', recursive: false },
    ])
  })

  it('accepts a null build command', () => {
    const config = AppConfigSchema.parse({ build: { command: null } })
    expect(config.build.command).toBeNull()
  })

  it('rejects a webhook path without a leading slash', () => {
    const result = AppConfigSchema.safeParse({
      server: { webhookPath: 'webhook' },
    })
    expect(result.success).toBe(false)
  })

  it('rejects a relative remote root', () => {
    expect(AppConfigSchema.safeParse({ remote: { root: 'blog' } }).success).toBe(false)
  })

  it('rejects out-of-range ports', () => {
    expect(AppConfigSchema.safeParse({ server: { port: 70000 } }).success).toBe(false)
  })
})
