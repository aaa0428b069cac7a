import { promises as dns } from 'dns'
import { isIpv4Literal } from '../utils/ip-utils.js'
import { ResolutionError } from './errors.js'

export interface LookupAddress {
  address: string
  family: number
}

export type LookupFn = (hostname: string) => Promise<LookupAddress[]>

const lookupIpv4: LookupFn = (hostname) => dns.lookup(hostname, { family: 4, all: true })

/**
 * Resolve a hostname or IPv4 literal to a single IPv4 address.
 * Literals are returned as-is without touching the resolver.
 *
 * @throws ResolutionError when the lookup fails or returns nothing
 */
export async function resolveTarget(target: string, lookup: LookupFn = lookupIpv4): Promise<string> {
  const host = target.trim()
  if (host === '') {
    throw new ResolutionError(target)
  }
  if (isIpv4Literal(host)) {
    return host
  }

  let candidates: LookupAddress[]
  try {
    candidates = await lookup(host)
  } catch (err) {
    throw new ResolutionError(target, err)
  }

  const first = candidates.find(c => c.family === 4)
  if (!first) {
    throw new ResolutionError(target)
  }
  return first.address
}
