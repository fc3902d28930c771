export type HexAddress = `0x${string}`
export type HexData = `0x${string}`

export type RequestOptions = {
  signal?: AbortSignal
}

export type WeightedOwner = {
  address: HexAddress
  weight: number
}

export type WebAuthnOwner = {
  publicKeyX: string
  publicKeyY: string
  weight: number
}

export type WeightedMultisig = {
  owners: WeightedOwner[]
  webauthnOwners?: WebAuthnOwner[]
  thresholdWeight: number
}

export type InitialOwnershipConfiguration = {
  ownershipContractAddress?: HexAddress
  weightedMultisig: WeightedMultisig
}

export type ScaConfiguration = {
  initialOwnershipConfiguration: InitialOwnershipConfiguration
  scaCore: string
  initCode?: HexData
}

export type WalletMetadata = {
  name?: string
}

export type AddressDerivationRequest = {
  scaConfiguration: ScaConfiguration
  metadata: WalletMetadata
}

// Shape returned by the transport. Everything is optional; the core only passes it through.
export type ModularWallet = {
  id?: string
  address?: string
  blockchain?: string
  state?: string
  name?: string
  scaCore?: string
  scaConfiguration?: {
    initialOwnershipConfiguration?: unknown
    scaCore?: string
    initCode?: string
  }
  createDate?: string
  updateDate?: string
  [key: string]: unknown
}

export interface ModularTransport {
  resolveAddress(request: AddressDerivationRequest, options?: RequestOptions): Promise<ModularWallet>
}

export interface OwnerSigner {
  readonly address: HexAddress
  sign(digest: HexData): Promise<HexData>
}

export type RawSignature = {
  r: HexData
  s: HexData
  v: number
}

export type PackedSignature = HexData
