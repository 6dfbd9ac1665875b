import { join } from 'node:path'

import { z } from 'zod'

import { JsonStore } from '../core/json-store.js'
import type { Logger } from '../core/types.js'

/**
 * Currency balances keyed by lowercase username, persisted in
 * `<dataDir>/balances.json`.
 */
export class Bank {
  private readonly store: JsonStore<number>

  constructor(
    dataDir: string,
    private readonly startingBalance: () => number,
    logger: Logger
  ) {
    this.store = new JsonStore(join(dataDir, 'balances.json'), z.number().int(), logger)
  }

  async init(): Promise<void> {
    await this.store.init()
  }

  /** `undefined` when the user has no account. */
  balanceOf(username: string): number | undefined {
    return this.store.get(username.toLowerCase())
  }

  hasAccount(username: string): boolean {
    return this.store.has(username.toLowerCase())
  }

  /** Returns the balance, opening the account with the starting balance first if needed. */
  async ensureAccount(username: string): Promise<number> {
    const existing = this.balanceOf(username)
    if (existing !== undefined) return existing

    const opening = this.startingBalance()
    await this.setBalance(username, opening)
    return opening
  }

  async setBalance(username: string, amount: number): Promise<void> {
    await this.store.set(username.toLowerCase(), Math.trunc(amount))
  }

  /**
   * Adds `delta` (may be negative) and returns the new balance.
   * With `floor`, the result never drops below zero.
   */
  async adjust(username: string, delta: number, options: { floor?: boolean } = {}): Promise<number> {
    const current = this.balanceOf(username) ?? 0
    let next = current + delta
    if (options.floor && next < 0) next = 0
    await this.setBalance(username, next)
    return next
  }

  /** Richest accounts first; ties keep insertion order. */
  top(limit: number): Array<{ username: string; balance: number }> {
    return this.store
      .entries()
      .map(([username, balance]) => ({ username, balance }))
      .sort((a, b) => b.balance - a.balance)
      .slice(0, limit)
  }

  accountCount(): number {
    return this.store.size()
  }
}
