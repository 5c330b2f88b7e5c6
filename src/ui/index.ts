/**
 * UI module - terminal progress feedback
 */

export { SpinnerService, createSpinnerService } from './spinner-service';
export type { Spinner, SpinnerServiceConfig } from './spinner-service';
