export * from './wallet/types'
export * from './wallet/constants'
export * from './wallet/errors'
export * from './wallet/config'
export * from './wallet/utils/address'
export * from './wallet/utils/signature'
export * from './wallet/utils/replaySafeHash'
export * from './wallet/rpc/client'
export * from './wallet/transport/modular'
export * from './wallet/signers/local'
export * from './wallet/accounts/addressDerivation'
export * from './wallet/accounts/LocalSmartAccountDelegate'
export * from './wallet/accounts/ModularSmartAccount'
