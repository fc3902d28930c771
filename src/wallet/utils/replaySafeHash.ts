import {
  concat,
  encodeAbiParameters,
  encodePacked,
  getAddress,
  isAddress,
  keccak256,
  pad,
  toHex,
} from 'viem'

import { EIP712_PREFIX, REPLAY_SAFE_HASH_V1, WEIGHTED_MULTISIG_PLUGIN_ADDRESS } from '../constants'
import { InvalidInputError } from '../errors'
import type { HexAddress, HexData } from '../types'
import { assertDigest } from './signature'

const assertAddress = (field: string, value: string): HexAddress => {
  if (!isAddress(value, { strict: false })) {
    throw new InvalidInputError(field, 'expected a 0x-prefixed 20-byte address')
  }
  return getAddress(value)
}

export const getModuleIdHash = (): HexData =>
  keccak256(
    encodePacked(['string', 'string'], [REPLAY_SAFE_HASH_V1.name, REPLAY_SAFE_HASH_V1.version]),
  )

export const getModuleTypeHash = (): HexData => keccak256(toHex(REPLAY_SAFE_HASH_V1.moduleType))

// EIP-712 digest the plugin verifies in place of `hash`. The domain salt is the account
// address right-padded to 32 bytes.
export const getReplaySafeHash = (
  chainId: number,
  account: string,
  hash: string,
  verifyingContract: string = WEIGHTED_MULTISIG_PLUGIN_ADDRESS,
): HexData => {
  if (!Number.isSafeInteger(chainId) || chainId <= 0) {
    throw new InvalidInputError('chainId', 'expected a positive integer')
  }

  const domainSeparator = keccak256(
    encodeAbiParameters(
      [
        { type: 'bytes32' },
        { type: 'bytes32' },
        { type: 'uint256' },
        { type: 'address' },
        { type: 'bytes32' },
      ],
      [
        keccak256(toHex(REPLAY_SAFE_HASH_V1.domainSeparatorType)),
        getModuleIdHash(),
        BigInt(chainId),
        assertAddress('verifyingContract', verifyingContract),
        pad(assertAddress('account', account), { dir: 'right', size: 32 }),
      ],
    ),
  )
  const structHash = keccak256(
    encodeAbiParameters(
      [{ type: 'bytes32' }, { type: 'bytes32' }],
      [getModuleTypeHash(), assertDigest(hash)],
    ),
  )

  return keccak256(concat([EIP712_PREFIX, domainSeparator, structHash]))
}
