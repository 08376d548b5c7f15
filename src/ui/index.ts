/**
 * UI module - progress display
 */

export {
  SpinnerService,
  NullSpinner,
  TextSpinner,
  createSpinnerService,
  createQuietSpinnerService,
} from './spinner-service';
export type { Spinner, SpinnerServiceConfig } from './spinner-service';
