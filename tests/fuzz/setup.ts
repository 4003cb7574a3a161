/**
 * Vitest setup file for fuzz tests.
 * Configures fast-check global defaults.
 */
import * as fc from 'fast-check'

const fuzzIterations = process.env.FUZZ_ITERATIONS ?? ''
const parsed = fuzzIterations ? parseInt(fuzzIterations, 10) : NaN
const numRuns = isNaN(parsed) ? 100 : parsed // FUZZ_ITERATIONS=1000+ for deep runs

const fuzzVerbose = (process.env.FUZZ_VERBOSE ?? 'false') === 'true'

fc.configureGlobal({
  numRuns,
  verbose: fuzzVerbose,
})

if (fuzzVerbose) {
  console.log(`\nfast-check configured: ${numRuns} iterations per property`)
}
