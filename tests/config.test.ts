import { afterEach, describe, expect, test, vi } from 'vitest'
import { toBool, toClassifierMode, toNumber, toStrategy } from '../src/config/env.js'
import { buildConfig, collisionDistanceNm, deriveHorizonSteps } from '../src/traffic/config.js'

describe('env parsing', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
    vi.resetModules()
  })

  test('toNumber falls back on missing or bad input', () => {
    expect(toNumber(undefined, 5)).toBe(5)
    expect(toNumber('', 5)).toBe(5)
    expect(toNumber('abc', 5)).toBe(5)
    expect(toNumber('12.5', 5)).toBe(12.5)
  })

  test('toBool accepts the usual truthy spellings', () => {
    expect(toBool('1')).toBe(true)
    expect(toBool(' TRUE ')).toBe(true)
    expect(toBool('yes')).toBe(true)
    expect(toBool('no', true)).toBe(false)
    expect(toBool(undefined, true)).toBe(true)
  })

  test('strategy and classifier default to the reactive bearing setup', () => {
    expect(toStrategy('Backtracking')).toBe('backtracking')
    expect(toStrategy('whatever')).toBe('reactive')
    expect(toStrategy(undefined)).toBe('reactive')
    expect(toClassifierMode('headingDifference')).toBe('headingDifference')
    expect(toClassifierMode('other')).toBe('relativeBearing')
  })

  test('reads overrides from the environment', async () => {
    vi.stubEnv('SAFETY_ZONE_M', '150')
    vi.stubEnv('HORIZON_NM', '3')
    vi.stubEnv('AVOIDANCE_STRATEGY', 'backtracking')
    vi.stubEnv('DEBUG_LOGS', 'true')
    const { env } = await import('../src/config/env.js')
    expect(env.safetyZoneRadiusM).toBe(150)
    expect(env.horizonNm).toBe(3)
    expect(env.strategy).toBe('backtracking')
    expect(env.debugLogs).toBe(true)
  })
})

describe('buildConfig', () => {
  test('derives horizon steps from horizon, speed and step length', () => {
    const config = buildConfig({ horizonNm: 5, maxSpeedKnots: 20, stepSeconds: 30 })
    expect(config.horizonSteps).toBe(30)
    expect(deriveHorizonSteps(5, 0, 30)).toBe(0)
  })

  test('an explicit step count wins over the derived one', () => {
    const config = buildConfig({ horizonNm: 5, maxSpeedKnots: 20, stepSeconds: 30, horizonSteps: 4 })
    expect(config.horizonSteps).toBe(4)
  })

  test('merges partial maneuver and action space settings', () => {
    const config = buildConfig({ maneuvers: { orangeTurnDeg: 10 }, actionSpace: { headingStepDeg: 30 } })
    expect(config.maneuvers).toEqual({
      redTurnDeg: 20,
      redSpeedChange: -3,
      orangeTurnDeg: 10,
      revertThreshold: 1e-3,
    })
    expect(config.actionSpace).toEqual({ speedStepKnots: 2, headingStepDeg: 30 })
  })

  test('collision distance is two safety radii in nautical miles', () => {
    expect(collisionDistanceNm(buildConfig({ safetyZoneRadiusM: 926 }))).toBe(1)
  })
})
