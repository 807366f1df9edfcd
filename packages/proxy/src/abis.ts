import { parseAbi } from "viem";

export const ERC4626_ABI = parseAbi([
  "function asset() view returns (address)",
  "function deposit(uint256 assets, address receiver) returns (uint256 shares)",
  "function withdraw(uint256 assets, address receiver, address owner) returns (uint256 shares)",
  "function redeem(uint256 shares, address receiver, address owner) returns (uint256 assets)",
]);

export const REWARD_DISTRIBUTOR_ABI = parseAbi([
  "function claim(address account, address reward, uint256 claimable, bytes32[] proof) returns (uint256 amount)",
]);
