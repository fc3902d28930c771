import { encodePacked, hashMessage, hexToNumber, slice } from 'viem'

import {
  DIGEST_BYTE_LENGTH,
  RAW_SIGNATURE_BYTE_LENGTH,
  SIGNATURE_COMPONENT_BYTE_LENGTH,
  SIG_TYPE_FLAG_DIGEST,
} from '../constants'
import { InvalidDigestError, InvalidSignatureError } from '../errors'
import type { HexData, PackedSignature, RawSignature } from '../types'

const HEX_BODY = /^[0-9a-fA-F]*$/

const MAX_V = 0xff

export const assertDigest = (digest: string): HexData => {
  if (!digest.startsWith('0x') || !HEX_BODY.test(digest.slice(2))) {
    throw new InvalidDigestError(digest, 'expected a 0x-prefixed hex string')
  }

  const body = digest.slice(2)
  if (body.length !== DIGEST_BYTE_LENGTH * 2) {
    throw new InvalidDigestError(
      digest,
      `expected ${DIGEST_BYTE_LENGTH} bytes, received ${body.length / 2}`,
    )
  }

  return `0x${body.toLowerCase()}` as const
}

// EIP-191 personal message hash of the digest bytes (not of their hex text).
export const hashDigestMessage = (digest: HexData): HexData => hashMessage({ raw: digest })

export const parseRawSignature = (signature: unknown): RawSignature => {
  if (typeof signature !== 'string') {
    throw new InvalidSignatureError('expected a hex string')
  }
  if (!signature.startsWith('0x')) {
    throw new InvalidSignatureError('missing 0x prefix')
  }

  const body = signature.slice(2)
  if (!HEX_BODY.test(body)) {
    throw new InvalidSignatureError('not a hex string')
  }
  if (body.length % 2 !== 0) {
    throw new InvalidSignatureError(`odd hex length ${body.length}`)
  }
  if (body.length !== RAW_SIGNATURE_BYTE_LENGTH * 2) {
    throw new InvalidSignatureError(
      `expected ${RAW_SIGNATURE_BYTE_LENGTH} bytes, received ${body.length / 2}`,
    )
  }

  const hex = `0x${body.toLowerCase()}` as const

  return {
    r: slice(hex, 0, SIGNATURE_COMPONENT_BYTE_LENGTH),
    s: slice(hex, SIGNATURE_COMPONENT_BYTE_LENGTH, SIGNATURE_COMPONENT_BYTE_LENGTH * 2),
    v: hexToNumber(slice(hex, RAW_SIGNATURE_BYTE_LENGTH - 1, RAW_SIGNATURE_BYTE_LENGTH)),
  }
}

const isSignatureComponent = (value: string): boolean =>
  value.startsWith('0x') &&
  value.length === 2 + SIGNATURE_COMPONENT_BYTE_LENGTH * 2 &&
  HEX_BODY.test(value.slice(2))

export const serializeRawSignature = ({ r, s, v }: RawSignature): HexData => {
  if (!isSignatureComponent(r)) {
    throw new InvalidSignatureError(`r must be ${SIGNATURE_COMPONENT_BYTE_LENGTH} bytes`)
  }
  if (!isSignatureComponent(s)) {
    throw new InvalidSignatureError(`s must be ${SIGNATURE_COMPONENT_BYTE_LENGTH} bytes`)
  }
  if (!Number.isInteger(v) || v < 0 || v > MAX_V) {
    throw new InvalidSignatureError(`v ${v} does not fit in one byte`)
  }

  const packed = encodePacked(['bytes32', 'bytes32', 'uint8'], [r, s, v])
  return `0x${packed.slice(2).toLowerCase()}` as const
}

// `r || s || v`; personal-message digests (user operations with gas fields) offset `v` by `flag`.
export const encodePackedSignature = (
  signature: RawSignature,
  hasUserOpGas: boolean,
  flag: number = SIG_TYPE_FLAG_DIGEST,
): PackedSignature => {
  const adjustedV = hasUserOpGas ? signature.v + flag : signature.v
  if (adjustedV > MAX_V) {
    throw new InvalidSignatureError(`v ${signature.v} with digest flag ${flag} exceeds one byte`)
  }

  return serializeRawSignature({ ...signature, v: adjustedV })
}
