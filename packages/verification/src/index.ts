/**
 * @forgeloop/verification
 */

export {
  CHECK_TABLES,
  type CheckResult,
  type CheckSpec,
  type CheckTable,
  type Expectations,
  type Probe,
} from './check-tables.js';
export { jsonTypeOf, validateAgainstSchema } from './json-schema.js';
export { checkFormat, checkLint, checkSyntax } from './quality.js';
export {
  expectationsFromArgs,
  VerificationEngine,
  type VerificationEngineOptions,
  type VerificationTarget,
} from './verification-engine.js';
