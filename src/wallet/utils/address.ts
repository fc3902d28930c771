import { getAddress, isAddress } from 'viem'

import { InvalidAddressError } from '../errors'
import type { HexAddress } from '../types'

const withHexPrefix = (value: string) =>
  value.startsWith('0x') || value.startsWith('0X') ? `0x${value.slice(2)}` : `0x${value}`

// Any letter case, `0x` optional; returns the EIP-55 form.
export const normalizeOwnerAddress = (address: string): HexAddress => {
  const prefixed = withHexPrefix(address)
  if (!isAddress(prefixed, { strict: false })) {
    throw new InvalidAddressError(address)
  }

  return getAddress(prefixed)
}
