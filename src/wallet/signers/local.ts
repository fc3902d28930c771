import { isHex, type SignableMessage } from 'viem'
import { privateKeyToAccount, type PrivateKeyAccount } from 'viem/accounts'

import { InvalidInputError } from '../errors'
import { assertDigest } from '../utils/signature'
import type { HexAddress, HexData, OwnerSigner } from '../types'

const PRIVATE_KEY_HEX_LENGTH = 66

// `sign` signs the 32-byte hash as given, without the personal-message prefix.
export class LocalOwner implements OwnerSigner {
  readonly address: HexAddress
  readonly signTypedData: PrivateKeyAccount['signTypedData']
  private readonly account: PrivateKeyAccount

  constructor(account: PrivateKeyAccount) {
    this.account = account
    this.address = account.address
    this.signTypedData = account.signTypedData
  }

  async sign(digest: HexData): Promise<HexData> {
    return this.account.sign({ hash: assertDigest(digest) })
  }

  async signMessage(message: SignableMessage): Promise<HexData> {
    return this.account.signMessage({ message })
  }
}

export const privateKeyToOwner = (privateKey: string): LocalOwner => {
  if (!isHex(privateKey, { strict: true }) || privateKey.length !== PRIVATE_KEY_HEX_LENGTH) {
    throw new InvalidInputError('privateKey', 'expected a 0x-prefixed 32-byte hex string')
  }

  return new LocalOwner(privateKeyToAccount(privateKey))
}
