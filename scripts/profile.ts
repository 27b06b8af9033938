import { performance } from 'node:perf_hooks'
import { createSeededRandom } from '../src/lib/rng.js'
import buildTrafficScenario from '../src/traffic/buildScenario.js'
import { createStrategy, createWorld } from '../src/traffic/Scenarios.js'
import { env } from '../src/config/env.js'

const scenario = buildTrafficScenario({ rng: createSeededRandom(7) })
const world = createWorld(scenario, createStrategy(env.strategy))
const steps = Math.round((60 * 60) / world.config.stepSeconds)
let maxMs = 0
console.time('sim')
const start = performance.now()
for (let i = 0; i < steps; i++) {
  const frameStart = performance.now()
  world.step()
  const elapsed = performance.now() - frameStart
  if (elapsed > maxMs) maxMs = elapsed
}
const total = performance.now() - start
console.timeEnd('sim')
console.log('strategy', world.strategyName)
console.log('avg step ms', (total / steps).toFixed(3))
console.log('max step ms', maxMs.toFixed(3))
console.log('#vessels processed', scenario.vessels.length)
