#!/usr/bin/env node
/**
 * @yield-proxy/demo — Interactive CLI walkthrough.
 *
 * Runs one proxy through its whole lifecycle in your terminal:
 * boot -> create proxy -> deposit -> accrue yield -> withdraw ->
 * claim reward -> rejected call -> signature check -> audit log
 *
 * Uses the real proxy package over in-process collaborators (no chain).
 */

import chalk from "chalk";
import { encodeFunctionData, keccak256, maxUint256, toFunctionSelector, toHex } from "viem";
import { generatePrivateKey, privateKeyToAccount } from "viem/accounts";
import { InMemoryEventStore } from "@yield-proxy/event-store";
import { formatAmount } from "@yield-proxy/ledger";
import {
  DispatcherVaultInspector,
  ERC4626_ABI,
  InMemoryCallRouter,
  InMemoryTokenBook,
  InProcessBundleExecutor,
  InProcessPermitTransfer,
  InProcessRewardDistributor,
  InProcessVault,
  ProxyFactory,
  StateJournal,
  StaticAllowList,
  ViemSignatureVerifier,
  createLogger,
  errorCode,
  loadProxyConfig,
} from "@yield-proxy/proxy";
import type { Address } from "@yield-proxy/types";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 600;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                    YIELD PROXY DEMO                      ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("        Custodial yield with performance-fee splits        ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(0, 50 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
}

function hashLine(label: string, hash: string): void {
  const short = hash.length > 16 ? `${hash.slice(0, 16)}...${hash.slice(-8)}` : hash;
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.yellow(short));
}

function warn(msg: string): void {
  console.log(chalk.yellow("    ! ") + chalk.yellow(msg));
}

/** Format a 6-decimal token amount. */
function usdc(amount: bigint): string {
  return formatAmount(amount, USDC_DECIMALS);
}

const TOTAL_STEPS = 9;

// Fixed demo addresses. Role addresses come from config when set.
const DEFAULT_ENV = {
  PROXY_FACTORY_ADDRESS: "0x1000000000000000000000000000000000000001",
  PROXY_TREASURY_ADDRESS: "0x1000000000000000000000000000000000000003",
  PROXY_EXECUTOR_ADDRESS: "0x1000000000000000000000000000000000000004",
  LOG_LEVEL: "error",
  NODE_ENV: "production",
};
const OPERATOR: Address = "0x1000000000000000000000000000000000000002";
const PERMIT: Address = "0x1000000000000000000000000000000000000005";
const STRANGER: Address = "0x2000000000000000000000000000000000000002";
const PROXY: Address = "0x3000000000000000000000000000000000000001";
const USDC: Address = "0x4000000000000000000000000000000000000001";
const USDC_DECIMALS = 6;
const REWARD: Address = "0x4000000000000000000000000000000000000002";
const VAULT: Address = "0x5000000000000000000000000000000000000001";
const DISTRIBUTOR: Address = "0x5000000000000000000000000000000000000002";

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();
  console.log(chalk.gray("  Walk-through of one client's proxy, end to end."));
  console.log(chalk.gray("  Every step uses the real proxy package — no mocks.\n"));

  await sleep(DELAY_MS);

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Boot");

  const config = loadProxyConfig({ ...DEFAULT_ENV, ...process.env });
  const logger = createLogger(config);
  info("factory", config.PROXY_FACTORY_ADDRESS);
  info("treasury", config.PROXY_TREASURY_ADDRESS);
  info("default fee", `client keeps ${config.PROXY_DEFAULT_FEE_BPS / 100}% of profit`);

  const journal = new StateJournal();
  const tokens = new InMemoryTokenBook();
  const router = new InMemoryCallRouter();
  const events = new InMemoryEventStore();
  const permit = new InProcessPermitTransfer(PERMIT, tokens);
  journal.register(tokens);
  journal.register(router);
  journal.register(permit);

  const vault = new InProcessVault({ address: VAULT, asset: USDC, tokens, pullVia: PERMIT });
  const distributor = new InProcessRewardDistributor(DISTRIBUTOR, tokens);
  router.register(VAULT, vault);
  router.register(DISTRIBUTOR, distributor);
  ok("Token book, call router and journal ready");

  const allowList = new StaticAllowList()
    .allow(VAULT, toFunctionSelector("function deposit(uint256,address)"), ["deposit"])
    .allow(VAULT, toFunctionSelector("function withdraw(uint256,address,address)"), ["withdrawal"]);

  const factory = new ProxyFactory({
    address: config.PROXY_FACTORY_ADDRESS,
    operator: OPERATOR,
    treasury: config.PROXY_TREASURY_ADDRESS,
    allowList,
    tokens,
    dispatcher: router,
    permit,
    executor: new InProcessBundleExecutor(config.PROXY_EXECUTOR_ADDRESS, router),
    vaults: new DispatcherVaultInspector(router),
    signatures: new ViemSignatureVerifier(),
    journal,
    events,
    logger,
    defaultFeeBps: config.PROXY_DEFAULT_FEE_BPS,
  });
  ok("Factory online with vault deposit/withdraw allow-listed");

  await sleep(DELAY_MS);

  // ─── Step 2: Create Proxy ───────────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Create Proxy");

  const client = privateKeyToAccount(generatePrivateKey());
  tokens.mint(USDC, client.address, 100_000_000n);
  tokens.approve(USDC, client.address, PERMIT, maxUint256);

  const proxy = factory.createProxy(OPERATOR, {
    address: PROXY,
    client: client.address,
  });
  info("client", client.address);
  info("proxy", proxy.address);
  info("fee bps", String(proxy.feeBps));
  ok(`Proxy ${proxy.status}`);

  await sleep(DELAY_MS);

  // ─── Step 3: Deposit ────────────────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Deposit");

  const principal = 10_000_000n;
  const deposit = factory.deposit(OPERATOR, client.address, {
    target: VAULT,
    data: encodeFunctionData({
      abi: ERC4626_ABI,
      functionName: "deposit",
      args: [principal, PROXY],
    }),
    permit: {
      token: USDC,
      amount: principal,
      nonce: 0n,
      deadline: BigInt(Math.floor(Date.now() / 1000) + 3600),
      signature: "0x",
    },
  });
  info("amount", `${usdc(deposit.amount)} USDC`);
  info("vault shares", tokens.balanceOf(VAULT, PROXY).toString());
  ok(`Principal recorded: ${usdc(proxy.getTotalDeposited(USDC))} USDC`);

  await sleep(DELAY_MS);

  // ─── Step 4: Accrue Yield ───────────────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Accrue Yield");

  vault.accrue(300_000n);
  info("vault assets", `${usdc(vault.totalAssets())} USDC`);
  ok("Vault earned 3%");

  await sleep(DELAY_MS);

  // ─── Step 5: Withdraw ───────────────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Withdraw");

  const shares = tokens.balanceOf(VAULT, PROXY);
  const assets = vault.convertToAssets(shares);
  const withdrawal = proxy.withdraw(client.address, {
    target: VAULT,
    data: encodeFunctionData({
      abi: ERC4626_ABI,
      functionName: "withdraw",
      args: [assets, PROXY, PROXY],
    }),
    vault: VAULT,
    shares,
  });
  info("released", `${usdc(withdrawal.amount)} USDC`);
  info("new profit", `${usdc(withdrawal.newProfit)} USDC`);
  info("treasury fee", `${usdc(withdrawal.feeAmount)} USDC`);
  info("client gets", `${usdc(withdrawal.clientAmount)} USDC`);
  ok("Only profit above principal was charged");

  await sleep(DELAY_MS);

  // ─── Step 6: Claim Reward ───────────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Claim Reward");

  tokens.mint(REWARD, DISTRIBUTOR, 5_000_000n);
  distributor.setEntitlement(PROXY, REWARD, 1_000_000n);
  const claim = proxy.claimReward(OPERATOR, {
    distributor: DISTRIBUTOR,
    reward: REWARD,
    amount: 1_000_000n,
    proof: [],
  });
  info("claimed", `${usdc(claim.amount)} REWARD`);
  info("treasury fee", `${usdc(claim.feeAmount)} REWARD`);
  info("client gets", `${usdc(claim.clientAmount)} REWARD`);
  ok("Operator claimed on the client's behalf");

  await sleep(DELAY_MS);

  // ─── Step 7: Rejected Call ──────────────────────────────────────────

  stepHeader(7, TOTAL_STEPS, "Rejected Call");

  const versionBefore = events.streamVersion(proxy.streamId);
  try {
    proxy.callAnyFunction(STRANGER, { target: VAULT, data: "0x01e1d114" });
    warn("Stranger call unexpectedly succeeded");
  } catch (err) {
    info("caller", STRANGER);
    info("rejected with", errorCode(err) ?? String(err));
  }
  if (events.streamVersion(proxy.streamId) === versionBefore) {
    ok("Nothing was recorded for the rejected call");
  } else {
    warn("Rejected call left events behind");
  }

  await sleep(DELAY_MS);

  // ─── Step 8: Signature Check ────────────────────────────────────────

  stepHeader(8, TOTAL_STEPS, "Signature Check");

  const hash = keccak256(toHex("rebalance to vault B"));
  const signature = await client.sign({ hash });
  hashLine("message hash", hash);
  const magic = await proxy.validateSignature(hash, signature);
  info("magic value", magic);
  ok("Client signature accepted on behalf of the proxy");

  await sleep(DELAY_MS);

  // ─── Step 9: Audit Log ──────────────────────────────────────────────

  stepHeader(9, TOTAL_STEPS, "Audit Log");

  const stored = events.read(proxy.streamId);
  info("stream", proxy.streamId);
  info("events", `${stored.length} total`);
  console.log();
  for (const se of stored) {
    const line = JSON.stringify({
      v: se.version,
      type: se.event.type,
      hash: se.hash.slice(0, 12) + "...",
    });
    console.log(chalk.gray("    ") + chalk.dim(line));
  }
  const integrity = events.verifyIntegrity();
  if (integrity.valid) {
    ok(`Hash chain verified through position ${integrity.lastVerifiedPosition}`);
  } else {
    warn(`Hash chain broken: ${integrity.errors.length} error(s)`);
  }

  console.log();
  console.log(chalk.white("    Principal:           ") + chalk.cyan.bold(`${usdc(principal)} USDC`));
  console.log(chalk.white("    Treasury (USDC):     ") + chalk.cyan.bold(usdc(tokens.balanceOf(USDC, config.PROXY_TREASURY_ADDRESS))));
  console.log(chalk.white("    Treasury (REWARD):   ") + chalk.cyan.bold(usdc(tokens.balanceOf(REWARD, config.PROXY_TREASURY_ADDRESS))));
  console.log(chalk.white("    Proxy balance:       ") + chalk.cyan.bold(usdc(tokens.balanceOf(USDC, PROXY))));
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
