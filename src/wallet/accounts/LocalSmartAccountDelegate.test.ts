import { hashMessage, keccak256, recoverAddress, toHex } from 'viem'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import { SIG_TYPE_FLAG_DIGEST, SMART_ACCOUNT_VERSION_V1 } from '../constants'
import { InvalidDigestError, InvalidSignatureError, SigningFailedError } from '../errors'
import { privateKeyToOwner } from '../signers/local'
import type { HexAddress, HexData, ModularTransport, OwnerSigner } from '../types'
import { parseRawSignature, serializeRawSignature } from '../utils/signature'
import { LocalSmartAccountDelegate } from './LocalSmartAccountDelegate'

const ownerAddress = '0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed' as HexAddress
const digest = `0x${'ab'.repeat(32)}` as HexData
const r = `${'00'.repeat(31)}01`
const s = `${'00'.repeat(31)}02`
const rawSignature = `0x${r}${s}1b` as HexData

const makeSigner = (sign: OwnerSigner['sign']): OwnerSigner => ({
  address: ownerAddress,
  sign,
})

describe('LocalSmartAccountDelegate.signAndWrap', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('signs the digest as is and keeps v for plain message hashes', async () => {
    const sign = vi.fn<OwnerSigner['sign']>().mockResolvedValue(rawSignature)
    const delegate = new LocalSmartAccountDelegate(makeSigner(sign))

    const packed = await delegate.signAndWrap(digest, false)

    expect(sign).toHaveBeenCalledWith(digest)
    expect(packed).toBe(`0x${r}${s}1b`)
  })

  it('signs the personal message hash and flags v when the payload carries gas', async () => {
    const sign = vi.fn<OwnerSigner['sign']>().mockResolvedValue(rawSignature)
    const delegate = new LocalSmartAccountDelegate(makeSigner(sign))

    const packed = await delegate.signAndWrap(digest, true)

    expect(sign).toHaveBeenCalledWith(hashMessage({ raw: digest }))
    expect(sign.mock.calls[0][0]).not.toBe(digest)
    expect(packed).toBe(`0x${r}${s}3b`)
    expect(Number.parseInt(packed.slice(-2), 16)).toBe(27 + SIG_TYPE_FLAG_DIGEST)
  })

  it('reports signer failures as SigningFailed', async () => {
    const cause = new Error('device locked')
    const delegate = new LocalSmartAccountDelegate(
      makeSigner(vi.fn<OwnerSigner['sign']>().mockRejectedValue(cause)),
    )

    const error = await delegate.signAndWrap(digest, false).catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(SigningFailedError)
    expect(error).toMatchObject({ kind: 'SigningFailed', cause })
    expect(console.warn).toHaveBeenCalledWith(
      '[LocalSmartAccountDelegate] Owner signer failed.',
      cause,
    )
  })

  it('reports malformed signer output as InvalidSignature', async () => {
    const delegate = new LocalSmartAccountDelegate(
      makeSigner(vi.fn<OwnerSigner['sign']>().mockResolvedValue(`${rawSignature}0` as HexData)),
    )

    await expect(delegate.signAndWrap(digest, false)).rejects.toThrowError(
      new InvalidSignatureError('odd hex length 131'),
    )
  })

  it('reports a signer that resolves without a signature as InvalidSignature', async () => {
    const sign = vi.fn<OwnerSigner['sign']>().mockResolvedValue(undefined as unknown as HexData)
    const delegate = new LocalSmartAccountDelegate(makeSigner(sign))

    await expect(delegate.signAndWrap(digest, false)).rejects.toThrowError(
      new InvalidSignatureError('expected a hex string'),
    )
  })

  it('rejects malformed hashes before calling the signer', async () => {
    const sign = vi.fn<OwnerSigner['sign']>()
    const delegate = new LocalSmartAccountDelegate(makeSigner(sign))

    await expect(delegate.signAndWrap('0x1234', true)).rejects.toBeInstanceOf(InvalidDigestError)
    expect(sign).not.toHaveBeenCalled()
  })

  it('does not sign once the caller has aborted', async () => {
    const sign = vi.fn<OwnerSigner['sign']>().mockResolvedValue(rawSignature)
    const delegate = new LocalSmartAccountDelegate(makeSigner(sign))
    const controller = new AbortController()
    const reason = new Error('cancelled by caller')
    controller.abort(reason)

    await expect(
      delegate.signAndWrap(digest, false, { signal: controller.signal }),
    ).rejects.toBe(reason)
    expect(sign).not.toHaveBeenCalled()
  })

  it('produces signatures that recover to the local owner', async () => {
    const owner = privateKeyToOwner(`0x${'11'.repeat(32)}`)
    const delegate = new LocalSmartAccountDelegate(owner)
    const hash = keccak256(toHex('user operation'))

    const plain = await delegate.signAndWrap(hash, false)
    expect(await recoverAddress({ hash, signature: plain })).toBe(owner.address)

    const flagged = parseRawSignature(await delegate.signAndWrap(hash, true))
    const unflagged = serializeRawSignature({ ...flagged, v: flagged.v - SIG_TYPE_FLAG_DIGEST })
    expect(
      await recoverAddress({ hash: hashMessage({ raw: hash }), signature: unflagged }),
    ).toBe(owner.address)
  })
})

describe('LocalSmartAccountDelegate.getModularWalletAddress', () => {
  it('derives the wallet for the owner address', async () => {
    const resolveAddress = vi
      .fn<ModularTransport['resolveAddress']>()
      .mockResolvedValue({ address: '0x000000000000000000000000000000000000cafe' })
    const delegate = new LocalSmartAccountDelegate(makeSigner(vi.fn<OwnerSigner['sign']>()))

    const wallet = await delegate.getModularWalletAddress({ resolveAddress }, 'v1', 'Savings')

    expect(wallet.address).toBe('0x000000000000000000000000000000000000cafe')
    const [request] = resolveAddress.mock.calls[0]
    expect(request.scaConfiguration.initialOwnershipConfiguration.weightedMultisig.owners).toEqual([
      { address: ownerAddress, weight: 1 },
    ])
    expect(request.metadata).toEqual({ name: 'Savings' })
  })

  it('maps known account versions to their scaCore', async () => {
    const resolveAddress = vi.fn<ModularTransport['resolveAddress']>().mockResolvedValue({})
    const delegate = new LocalSmartAccountDelegate(makeSigner(vi.fn<OwnerSigner['sign']>()))

    expect(SMART_ACCOUNT_VERSION_V1).toBe('circle_passkey_account_v1')
    await delegate.getModularWalletAddress({ resolveAddress }, SMART_ACCOUNT_VERSION_V1)
    await delegate.getModularWalletAddress({ resolveAddress }, 'custom_core_v2')

    expect(resolveAddress.mock.calls.map(([request]) => request.scaConfiguration.scaCore)).toEqual([
      'circle_6900_v1',
      'custom_core_v2',
    ])
  })
})
