import { resolveScaCore } from '../constants'
import { SigningFailedError } from '../errors'
import {
  assertDigest,
  encodePackedSignature,
  hashDigestMessage,
  parseRawSignature,
} from '../utils/signature'
import type {
  HexData,
  ModularTransport,
  ModularWallet,
  OwnerSigner,
  PackedSignature,
  RequestOptions,
} from '../types'
import { deriveWalletAddress } from './addressDerivation'

export class LocalSmartAccountDelegate {
  private readonly owner: OwnerSigner

  constructor(owner: OwnerSigner) {
    this.owner = owner
  }

  // `version` may be an account version alias; it is mapped to its scaCore before derivation.
  async getModularWalletAddress(
    transport: ModularTransport,
    version: string,
    name?: string,
    options: RequestOptions = {},
  ): Promise<ModularWallet> {
    return deriveWalletAddress(
      transport,
      this.owner.address,
      resolveScaCore(version),
      name,
      options,
    )
  }

  // With `hasUserOpGas` the owner signs the personal-message hash and `v` carries the digest flag.
  async signAndWrap(
    messageHash: string,
    hasUserOpGas: boolean,
    options: RequestOptions = {},
  ): Promise<PackedSignature> {
    const digest = assertDigest(messageHash)
    const payload = hasUserOpGas ? hashDigestMessage(digest) : digest

    options.signal?.throwIfAborted()

    let signature: HexData
    try {
      signature = await this.owner.sign(payload)
    } catch (error) {
      if (options.signal?.aborted) {
        throw error
      }
      console.warn('[LocalSmartAccountDelegate] Owner signer failed.', error)
      throw new SigningFailedError(error)
    }

    return encodePackedSignature(parseRawSignature(signature), hasUserOpGas)
  }
}
