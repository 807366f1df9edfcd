/**
 * @yield-proxy/proxy — Custodial yield proxy.
 *
 * Provides:
 * - YieldProxy: role-gated deposit, withdrawal, arbitrary call and reward
 *   claim operations with performance-fee splits
 * - ProxyFactory: one proxy per client, allow-list and operator role
 * - StateJournal: all-or-nothing execution across every participant
 * - In-process collaborators (token book, call router, vault, reward
 *   distributor, bundling executor, permit transfer, allow-list)
 * - Configuration and logging
 *
 * @packageDocumentation
 */

// Proxy
export { YieldProxy, ERC1271_MAGIC_VALUE } from "./yield-proxy.js";
export type {
  ProxyEnvironment,
  YieldProxyOptions,
  DepositRequest,
  DepositResult,
  WithdrawRequest,
  WithdrawResult,
  ClaimRewardRequest,
  ClaimRewardResult,
} from "./yield-proxy.js";

// Factory
export { ProxyFactory, DEFAULT_FEE_BPS } from "./factory.js";
export type { ProxyFactoryOptions, CreateProxyParams } from "./factory.js";

// Building blocks
export { AccessController } from "./access-controller.js";
export { ReentrancyGuard } from "./reentrancy-guard.js";
export { CalldataForwarder, splitCalldata } from "./forwarder.js";
export type { SplitCalldata } from "./forwarder.js";
export { StateJournal } from "./journal.js";
export type { Checkpointable } from "./journal.js";
export { EventOutbox } from "./outbox.js";
export type { OutboxContext } from "./outbox.js";
export { ViemSignatureVerifier } from "./signature.js";
export { DispatcherVaultInspector } from "./vault-inspector.js";
export { ERC4626_ABI, REWARD_DISTRIBUTOR_ABI } from "./abis.js";

// Collaborator contracts
export type {
  TokenBook,
  CallDispatcher,
  AllowListChecker,
  FactoryPort,
  PermitAuthorization,
  PermitTransfer,
  ClaimRewardInstruction,
  BundleInstruction,
  BundleExecutor,
  VaultInspector,
  SignatureVerifier,
} from "./collaborators.js";

// In-process world
export { InMemoryTokenBook } from "./in-process/token-book.js";
export type { TokenBookCheckpoint } from "./in-process/token-book.js";
export { InMemoryCallRouter } from "./in-process/call-router.js";
export type { ContractHandler } from "./in-process/call-router.js";
export { InProcessVault } from "./in-process/vault.js";
export type { InProcessVaultOptions } from "./in-process/vault.js";
export { InProcessRewardDistributor } from "./in-process/reward-distributor.js";
export { InProcessBundleExecutor } from "./in-process/bundle-executor.js";
export { InProcessPermitTransfer } from "./in-process/permit.js";
export type { InProcessPermitOptions } from "./in-process/permit.js";
export { StaticAllowList } from "./in-process/static-allow-list.js";

// Errors
export {
  ProxyError,
  FactoryError,
  TokenError,
  CallError,
  JournalError,
  errorCode,
} from "./errors.js";
export type {
  ProxyErrorCode,
  ProxyErrorDetails,
  FactoryErrorCode,
  TokenErrorCode,
  CallErrorCode,
  JournalErrorCode,
} from "./errors.js";

// Configuration & logging
export { loadProxyConfig, ProxyConfigSchema } from "./config.js";
export type { ProxyConfig } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";
