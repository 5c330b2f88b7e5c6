/**
 * IO module - root resolution, results directories, listings and input files
 */

export { TFB_HOME_VAR, resolveTfbCandidate, getTfbDir } from './tfb-dir';
export { formatResultsTimestamp, createResultsDir } from './results-dir';
export {
  printAll,
  printAllFrameworks,
  printAllTests,
  printAllTestsWithTag,
  printAllTestsForFramework,
} from './print-names';
export { readVerifications } from './read-verifications';
