import { DEFAULT_MODULAR_RPC_URL } from './constants'
import { InvalidInputError } from './errors'
import type { ModularTransportOptions } from './transport/modular'

type Env = Record<string, string | undefined>

const parseUrlList = (value?: string) =>
  (value ?? '')
    .split(',')
    .map((url) => url.trim())
    .filter(Boolean)

const parseTimeout = (value?: string) => {
  if (!value) {
    return undefined
  }

  const timeoutMs = Number(value)
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    throw new InvalidInputError('MODULAR_WALLET_TIMEOUT_MS', `expected a positive integer, got "${value}"`)
  }

  return timeoutMs
}

export const resolveModularTransportConfig = (env: Env = process.env): ModularTransportOptions => {
  const urls = parseUrlList(env.MODULAR_WALLET_RPC_URL)

  return {
    urls: urls.length > 0 ? urls : [DEFAULT_MODULAR_RPC_URL],
    clientKey: env.MODULAR_WALLET_CLIENT_KEY || undefined,
    timeoutMs: parseTimeout(env.MODULAR_WALLET_TIMEOUT_MS),
  }
}
