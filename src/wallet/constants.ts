// Weighted multisig parameters for a wallet secured by a single local key.
export const OWNER_WEIGHT = 1
export const THRESHOLD_WEIGHT = 1

// Added to `v` so the multisig plugin treats the signature as an eth_sign digest signature.
export const SIG_TYPE_FLAG_DIGEST = 32

export const DIGEST_BYTE_LENGTH = 32
export const SIGNATURE_COMPONENT_BYTE_LENGTH = 32
export const RAW_SIGNATURE_BYTE_LENGTH = 65

export const SMART_ACCOUNT_VERSION_V1 = 'circle_passkey_account_v1'

export const SMART_ACCOUNT_SCA_CORES: Record<string, string> = {
  [SMART_ACCOUNT_VERSION_V1]: 'circle_6900_v1',
}

export const resolveScaCore = (version: string): string =>
  SMART_ACCOUNT_SCA_CORES[version] ?? version

export const GET_ADDRESS_METHOD = 'circle_getAddress'
export const DEFAULT_MODULAR_RPC_URL = 'https://modular-sdk.circle.com/v1/rpc/w3s/buidl'

// Verifying contract and EIP-712 domain of the weighted multisig plugin's replay-safe hash.
export const WEIGHTED_MULTISIG_PLUGIN_ADDRESS = '0x0000000c984aff541d6ce86bb697e68ec57873c8'

export const REPLAY_SAFE_HASH_V1 = {
  name: 'Weighted Multisig Webauthn Plugin',
  version: '1.0.0',
  domainSeparatorType:
    'EIP712Domain(string name,string version,uint256 chainId,address verifyingContract,bytes32 salt)',
  moduleType: 'CircleWeightedWebauthnMultisigMessage(bytes32 hash)',
} as const

export const EIP712_PREFIX = '0x1901'
