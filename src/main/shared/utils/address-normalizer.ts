/** Expands an IPv6 address to eight zero-padded lower-case groups; IPv4 passes through. */
export function normalizeIPv6(ipv6: string): string {
  if (!ipv6.includes(':')) return ipv6

  let normalized = ipv6.split('%')[0]

  if (normalized.includes('::')) {
    const [left, right] = normalized.split('::')
    const leftGroups = left ? left.split(':').filter((g) => g) : []
    const rightGroups = right ? right.split(':').filter((g) => g) : []
    const missing = Math.max(0, 8 - leftGroups.length - rightGroups.length)

    normalized = [...leftGroups, ...Array<string>(missing).fill('0000'), ...rightGroups].join(':')
  }

  return normalized
    .split(':')
    .map((group) => group.padStart(4, '0'))
    .join(':')
    .toLowerCase()
}

const IPV6_LOOPBACK = normalizeIPv6('::1')
const IPV6_UNSPECIFIED = normalizeIPv6('::')

export function isLoopbackAddress(address: string | undefined): boolean {
  if (!address) return false
  if (address.includes('.') && !address.includes(':')) return address.startsWith('127.')
  // IPv4-mapped IPv6, e.g. ::ffff:127.0.0.1
  if (address.toLowerCase().startsWith('::ffff:127.')) return true
  return normalizeIPv6(address) === IPV6_LOOPBACK
}

/** True for wildcard or missing remote endpoints (listening sockets). */
export function isUnspecifiedAddress(address: string | undefined): boolean {
  if (!address || address === '*' || address === '0.0.0.0') return true
  if (!address.includes(':')) return false
  return normalizeIPv6(address) === IPV6_UNSPECIFIED
}
