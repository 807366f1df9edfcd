import { isAddressEqual, recoverAddress } from "viem";
import type { Address, Hex } from "@yield-proxy/types";
import type { SignatureVerifier } from "./collaborators.js";

/**
 * Recovers the secp256k1 signer of a 32-byte hash and compares it with
 * the expected signer. Malformed signatures reject with viem's error.
 */
export class ViemSignatureVerifier implements SignatureVerifier {
  async verify(signer: Address, hash: Hex, signature: Hex): Promise<boolean> {
    const recovered = await recoverAddress({ hash, signature });
    return isAddressEqual(recovered, signer);
  }
}
