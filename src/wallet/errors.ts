export type ModularWalletErrorKind =
  | 'InvalidAddress'
  | 'InvalidDigest'
  | 'InvalidInput'
  | 'SigningFailed'
  | 'InvalidSignature'
  | 'TransportFailure'

export class ModularWalletError extends Error {
  readonly kind: ModularWalletErrorKind

  constructor(kind: ModularWalletErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.kind = kind
    this.name = 'ModularWalletError'
  }
}

export class InvalidAddressError extends ModularWalletError {
  readonly address: string

  constructor(address: string) {
    super('InvalidAddress', `Invalid owner address: ${address}`)
    this.address = address
    this.name = 'InvalidAddressError'
  }
}

export class InvalidDigestError extends ModularWalletError {
  readonly digest: string

  constructor(digest: string, reason: string) {
    super('InvalidDigest', `Invalid message hash: ${reason}`)
    this.digest = digest
    this.name = 'InvalidDigestError'
  }
}

export class InvalidInputError extends ModularWalletError {
  readonly field: string

  constructor(field: string, reason: string) {
    super('InvalidInput', `Invalid ${field}: ${reason}`)
    this.field = field
    this.name = 'InvalidInputError'
  }
}

export class SigningFailedError extends ModularWalletError {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause ?? 'Unknown error')
    super('SigningFailed', `Owner failed to sign digest: ${detail}`, { cause })
    this.name = 'SigningFailedError'
  }
}

export class InvalidSignatureError extends ModularWalletError {
  readonly reason: string

  constructor(reason: string) {
    super('InvalidSignature', `Invalid signature: ${reason}`)
    this.reason = reason
    this.name = 'InvalidSignatureError'
  }
}

export class TransportFailureError extends ModularWalletError {
  constructor(message: string, cause?: unknown) {
    super('TransportFailure', message, { cause })
    this.name = 'TransportFailureError'
  }
}

export const isModularWalletError = (value: unknown): value is ModularWalletError =>
  value instanceof ModularWalletError
