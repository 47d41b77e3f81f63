/**
 * Vitest setup file for property tests.
 * Configures fast-check global defaults.
 */
import * as fc from 'fast-check'

// FUZZ_ITERATIONS=500 or more for a deep run
const fuzzIterations = process.env.FUZZ_ITERATIONS ?? ''
const parsed = fuzzIterations ? parseInt(fuzzIterations, 10) : NaN
const numRuns = isNaN(parsed) ? 50 : parsed

const fuzzVerbose = (process.env.FUZZ_VERBOSE ?? 'false') === 'true'

fc.configureGlobal({
  numRuns,
  // Print the seed of a failing run
  verbose: fuzzVerbose,
})
