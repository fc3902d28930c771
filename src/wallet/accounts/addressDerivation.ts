import { OWNER_WEIGHT, THRESHOLD_WEIGHT } from '../constants'
import { InvalidInputError, TransportFailureError, isModularWalletError } from '../errors'
import { normalizeOwnerAddress } from '../utils/address'
import type {
  AddressDerivationRequest,
  ModularTransport,
  ModularWallet,
  RequestOptions,
} from '../types'

// A single owner at full threshold weight; no WebAuthn owners.
export const buildAddressDerivationRequest = (
  ownerAddress: string,
  formatVersion: string,
  name?: string,
): AddressDerivationRequest => {
  const address = normalizeOwnerAddress(ownerAddress)
  if (formatVersion.length === 0) {
    throw new InvalidInputError('formatVersion', 'must not be empty')
  }

  return {
    scaConfiguration: {
      initialOwnershipConfiguration: {
        weightedMultisig: {
          owners: [{ address, weight: OWNER_WEIGHT }],
          thresholdWeight: THRESHOLD_WEIGHT,
        },
      },
      scaCore: formatVersion,
    },
    metadata: name === undefined ? {} : { name },
  }
}

export const deriveWalletAddress = async (
  transport: ModularTransport,
  ownerAddress: string,
  formatVersion: string,
  name?: string,
  options: RequestOptions = {},
): Promise<ModularWallet> => {
  const request = buildAddressDerivationRequest(ownerAddress, formatVersion, name)

  try {
    return await transport.resolveAddress(request, options)
  } catch (error) {
    if (isModularWalletError(error) || options.signal?.aborted) {
      throw error
    }
    const detail = error instanceof Error ? error.message : String(error)
    throw new TransportFailureError(`Address resolution failed: ${detail}`, error)
  }
}

export const getWalletInitCode = (wallet: ModularWallet): string | undefined =>
  wallet.scaConfiguration?.initCode
