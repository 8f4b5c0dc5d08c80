/**
 * @mintgate/launchpad — Multi-signer memecoin launch coordination.
 *
 * Token factory, signer coordinator, authorization policy and the
 * Launchpad composition root.
 */

export { Launchpad } from "./launchpad.js";
export type { LaunchpadConfig } from "./launchpad.js";

export { TokenFactory } from "./factory.js";
export type { TokenFactoryConfig } from "./factory.js";

export { SignerCoordinator } from "./coordinator.js";
export type { SignerCoordinatorConfig } from "./coordinator.js";

export { CallerIdentityPolicy } from "./authorization.js";
export type { AuthorizationPolicy, ProtectedAction } from "./authorization.js";

export { RequestGuard } from "./request-guard.js";
export { requiredApprovals, DEFAULT_QUORUM_MODE } from "./quorum.js";
export type { QuorumMode } from "./quorum.js";

export { InMemoryTokenDeployer } from "./token-deployer.js";
export type { TokenDeployer, DeployedToken } from "./token-deployer.js";

export { validateSubmission, validateTokenSpec, MIN_SIGNERS } from "./validation.js";
export { toIdentity } from "./identity.js";

export {
  REFERENCE_CURRENCY,
  POOL_FEE_TIER,
  POOL_TICK_SPACING,
  STARTING_SQRT_PRICE_X96,
  DEFAULT_LIQUIDITY_THRESHOLD,
} from "./constants.js";

export {
  LaunchpadError,
  ValidationError,
  AuthorizationError,
  StateConflictError,
  IntegrationFailure,
} from "./errors.js";
export type {
  LaunchpadErrorCode,
  LaunchpadErrorCategory,
  ValidationErrorCode,
  AuthorizationErrorCode,
  StateConflictErrorCode,
  IntegrationFailureCode,
} from "./errors.js";

export type {
  SignatureSet,
  SignatureSetStatus,
  SignResult,
  UnsignResult,
  CreationExecutor,
  SignatureSetOpener,
} from "./types.js";
