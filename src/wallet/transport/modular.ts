import { z } from 'zod'

import { GET_ADDRESS_METHOD } from '../constants'
import { TransportFailureError } from '../errors'
import { ModularRpcClient, type RpcClientOptions } from '../rpc/client'
import type {
  AddressDerivationRequest,
  ModularTransport,
  ModularWallet,
  RequestOptions,
} from '../types'

export const ModularWalletSchema = z
  .object({
    id: z.string().optional(),
    address: z.string().optional(),
    blockchain: z.string().optional(),
    state: z.string().optional(),
    name: z.string().optional(),
    scaCore: z.string().optional(),
    scaConfiguration: z
      .object({
        initialOwnershipConfiguration: z.unknown().optional(),
        scaCore: z.string().optional(),
        initCode: z.string().optional(),
      })
      .passthrough()
      .optional(),
    createDate: z.string().optional(),
    updateDate: z.string().optional(),
  })
  .passthrough()

export type ModularTransportOptions = RpcClientOptions & {
  method?: string
}

export const decodeModularWallet = (value: unknown): ModularWallet => {
  const parsed = ModularWalletSchema.safeParse(value)
  if (!parsed.success) {
    throw new TransportFailureError('Malformed wallet in address response', parsed.error)
  }

  return parsed.data
}

export class HttpModularTransport implements ModularTransport {
  private readonly client: ModularRpcClient
  private readonly method: string

  constructor(options: ModularTransportOptions) {
    this.client = new ModularRpcClient(options)
    this.method = options.method ?? GET_ADDRESS_METHOD
  }

  async resolveAddress(
    request: AddressDerivationRequest,
    options: RequestOptions = {},
  ): Promise<ModularWallet> {
    let result: unknown
    try {
      result = await this.client.request(this.method, [request], { signal: options.signal })
    } catch (error) {
      if (options.signal?.aborted) {
        throw error
      }
      const detail = error instanceof Error ? error.message : String(error)
      throw new TransportFailureError(`${this.method} failed: ${detail}`, error)
    }

    return decodeModularWallet(result)
  }
}

export const createModularTransport = (options: ModularTransportOptions): HttpModularTransport =>
  new HttpModularTransport(options)
