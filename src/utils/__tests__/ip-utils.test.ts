import { describe, it, expect } from 'vitest'
import { ipToNum, isIpv4Literal, isLoopback } from '../ip-utils.js'

describe('isIpv4Literal', () => {
  it('accepts dotted quads', () => {
    expect(isIpv4Literal('127.0.0.1')).toBe(true)
    expect(isIpv4Literal('255.255.255.255')).toBe(true)
    expect(isIpv4Literal('0.0.0.0')).toBe(true)
  })

  it('rejects anything else', () => {
    expect(isIpv4Literal('256.0.0.1')).toBe(false)
    expect(isIpv4Literal('10.0.0')).toBe(false)
    expect(isIpv4Literal('10.0.0.1.2')).toBe(false)
    expect(isIpv4Literal('example.com')).toBe(false)
    expect(isIpv4Literal('1.2.3.-4')).toBe(false)
    expect(isIpv4Literal('::1')).toBe(false)
    expect(isIpv4Literal('')).toBe(false)
  })
})

describe('ipToNum', () => {
  it('converts to an unsigned integer', () => {
    expect(ipToNum('0.0.0.1')).toBe(1)
    expect(ipToNum('1.0.0.0')).toBe(16777216)
    expect(ipToNum('255.255.255.255')).toBe(4294967295)
  })
})

describe('isLoopback', () => {
  it('matches the whole 127/8 block', () => {
    expect(isLoopback('127.0.0.1')).toBe(true)
    expect(isLoopback('127.255.0.9')).toBe(true)
    expect(isLoopback('128.0.0.1')).toBe(false)
    expect(isLoopback('localhost')).toBe(false)
  })
})
