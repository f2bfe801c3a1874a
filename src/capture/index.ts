export {
  Constraints,
  ConstraintsBuilder,
  SUPPORTED_CONSTRAINTS,
  buildConstraintsRequest,
  parseSupportedConstraint,
  renderConstraintFragments,
  type ConstraintDirectives,
  type FacingMode,
  type ResizeMode,
  type SupportedConstraint,
} from './constraints.js';

export {
  CaptureSession,
  type CaptureContext,
  type CaptureSessionState,
} from './CaptureSession.js';
