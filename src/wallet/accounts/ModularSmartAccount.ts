import {
  hashMessage,
  hashTypedData,
  isHex,
  keccak256,
  type SignableMessage,
  type TypedData,
  type TypedDataDefinition,
} from 'viem'

import { InvalidInputError } from '../errors'
import type { HexAddress, HexData, PackedSignature, RequestOptions } from '../types'
import { getReplaySafeHash } from '../utils/replaySafeHash'
import type { LocalSmartAccountDelegate } from './LocalSmartAccountDelegate'

export type ModularSmartAccountOptions = {
  delegate: LocalSmartAccountDelegate
  address: HexAddress
  chainId: number
}

// Signatures made on behalf of the wallet: every payload digest goes through the plugin's
// replay-safe hash and is signed without the digest flag.
export class ModularSmartAccount {
  readonly address: HexAddress
  readonly chainId: number
  private readonly delegate: LocalSmartAccountDelegate

  constructor({ delegate, address, chainId }: ModularSmartAccountOptions) {
    this.delegate = delegate
    this.address = address
    this.chainId = chainId
  }

  async sign(hex: string, options: RequestOptions = {}): Promise<PackedSignature> {
    if (!isHex(hex, { strict: true })) {
      throw new InvalidInputError('hex', 'expected a 0x-prefixed hex string')
    }
    return this.signReplaySafe(keccak256(hex), options)
  }

  async signMessage(
    message: SignableMessage,
    options: RequestOptions = {},
  ): Promise<PackedSignature> {
    return this.signReplaySafe(keccak256(hashMessage(message)), options)
  }

  async signTypedData<
    const typedData extends TypedData | Record<string, unknown>,
    primaryType extends keyof typedData | 'EIP712Domain',
  >(
    definition: TypedDataDefinition<typedData, primaryType>,
    options: RequestOptions = {},
  ): Promise<PackedSignature> {
    return this.signReplaySafe(keccak256(hashTypedData(definition)), options)
  }

  private async signReplaySafe(
    digest: HexData,
    options: RequestOptions,
  ): Promise<PackedSignature> {
    const hash = getReplaySafeHash(this.chainId, this.address, digest)
    return this.delegate.signAndWrap(hash, false, options)
  }
}
