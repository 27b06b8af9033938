import { readFile } from 'node:fs/promises'
import { env } from '../src/config/env.js'
import { Scenarios, createStrategy, createWorld, parseScenario } from '../src/traffic/Scenarios.js'
import type { Scenario } from '../src/traffic/Scenarios.js'

const MAX_STEPS = 2000

async function loadScenario(arg: string | undefined): Promise<Scenario> {
  if (!arg) return Scenarios.headOn
  if (arg.endsWith('.json')) {
    const text = await readFile(arg, 'utf8')
    return parseScenario(JSON.parse(text), arg)
  }
  return Scenarios.byName(arg)
}

async function main() {
  const scenario = await loadScenario(process.argv[2])
  const world = createWorld(scenario, createStrategy(env.strategy))
  console.log(
    `[simulate] ${scenario.name}: ${scenario.vessels.length} vessels, strategy=${world.strategyName}, ` +
      `horizonSteps=${world.config.horizonSteps}, step=${world.config.stepSeconds}s`
  )

  while (!world.isFinished() && world.timeStep < MAX_STEPS) {
    const report = world.step()
    if (report.encounters.length === 0 && report.actions.length === 0) continue
    const statuses = Array.from(report.statuses, ([id, s]) => `${id}:${s}`).join(' ')
    console.log(`[simulate] t=${report.timeStep} ${statuses}`)
    for (const enc of report.encounters) {
      console.log(
        `  ${enc.ids.join('/')} ${enc.severity} ${enc.scenario} roles=${enc.roles.join('/')} ` +
          `dist=${enc.distanceNm.toFixed(3)}NM`
      )
    }
    for (const a of report.actions) {
      console.log(
        `  action vessel=${a.vesselId} heading=${a.headingChange.toFixed(2)} speed=${a.speedChange.toFixed(2)}`
      )
    }
  }

  const outcome = world.isFinished() ? 'all vessels arrived' : 'step limit reached'
  console.log(`[simulate] ${outcome} after ${world.timeStep} steps`)
  for (const entry of world.getEncounterLog()) {
    console.log(`  closest approach ${entry.ids.join('/')}: ${entry.cpaNm.toFixed(3)} NM`)
  }
}

main().catch((error) => {
  console.error('[simulate] failed', error)
  process.exitCode = 1
})
