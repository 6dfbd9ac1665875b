import { describe, expect, it } from 'vitest'

import { PERMISSION_DENIED_REPLY } from '../src/commands/registry.js'
import { makeTestBot } from './helpers.js'

describe('economy module', () => {
  it('opens an account on first balance check', async () => {
    const { bot, say } = await makeTestBot()

    expect(await say('alice', '!balance', 'Alice')).toEqual(["Welcome! You've been given 5,000 coins to start!"])
    expect(await say('alice', '!bal', 'Alice')).toEqual(['Alice has 5,000 coins'])
    expect(bot.bank.balanceOf('ALICE')).toBe(5000)
  })

  it('keeps an account for a user named __proto__', async () => {
    const { bot, say } = await makeTestBot()

    expect(await say('__proto__', '!balance')).toEqual(["Welcome! You've been given 5,000 coins to start!"])
    expect(await say('__proto__', '!balance')).toEqual(['__proto__ has 5,000 coins'])
    expect(bot.bank.hasAccount('__proto__')).toBe(true)
  })

  it('uses the configured currency and starting balance', async () => {
    const { say } = await makeTestBot({ CURRENCY_NAME: 'shells', STARTING_BALANCE: '250' })

    expect(await say('alice', '!wallet')).toEqual(["Welcome! You've been given 250 shells to start!"])
  })

  describe('give', () => {
    it('moves money between accounts', async () => {
      const { bot, say } = await makeTestBot()
      await say('alice', '!balance')
      await say('bob', '!balance')

      expect(await say('alice', '!give @Bob 1200', 'Alice')).toEqual(['Alice gave 1,200 coins to bob'])
      expect(bot.bank.balanceOf('alice')).toBe(3800)
      expect(bot.bank.balanceOf('bob')).toBe(6200)
    })

    it('validates the arguments in order', async () => {
      const { say } = await makeTestBot()

      expect(await say('alice', '!give')).toEqual(['Usage: !give <username> <amount>'])
      expect(await say('alice', '!pay bob')).toEqual(['Usage: !give <username> <amount>'])
      expect(await say('alice', '!give bob ten')).toEqual(['Amount must be a number!'])
      expect(await say('alice', '!give bob 1.5')).toEqual(['Amount must be a number!'])
      expect(await say('alice', '!give bob 0')).toEqual(['Amount must be positive!'])
      expect(await say('alice', '!give @ALICE 5')).toEqual(["You can't give coins to yourself!"])
      expect(await say('alice', '!give bob 5')).toEqual(["You don't have an account! Use !balance first."])

      await say('alice', '!balance')
      expect(await say('alice', '!transfer bob 6000')).toEqual(['You only have 5,000 coins!'])
      expect(await say('alice', '!give bob 5')).toEqual(["bob doesn't have an account yet!"])
    })
  })

  it('looks up other balances', async () => {
    const { say } = await makeTestBot()
    await say('bob', '!balance')

    expect(await say('alice', '!checkbal @Bob')).toEqual(['bob has 5,000 coins'])
    expect(await say('alice', '!cb carol')).toEqual(["carol doesn't have an account yet!"])
    expect(await say('alice', '!checkbal')).toEqual(['Usage: !checkbal <username>'])
  })

  it('ranks the richest accounts', async () => {
    const { say } = await makeTestBot()
    expect(await say('alice', '!leaderboard')).toEqual(['No one has any coins yet!'])

    await say('alice', '!balance')
    await say('bob', '!balance')
    await say('alice', '!give bob 1200')

    expect(await say('carol', '!lb')).toEqual(['Richest: 1. bob: 6,200 | 2. alice: 3,800'])
  })

  it('lets admins set balances', async () => {
    const { bot, say, logger } = await makeTestBot()

    expect(await say('helper', '!setbal @Carol 42')).toEqual(["Set carol's balance to 42 coins"])
    expect(bot.bank.balanceOf('carol')).toBe(42)
    expect(logger.info).toHaveBeenCalledWith('economy.balance_set', { by: 'helper', target: 'carol', amount: 42 })

    expect(await say('helper', '!setbal carol -1')).toEqual(['Amount must be a non-negative number!'])
    expect(await say('alice', '!setbal alice 1000000')).toEqual([PERMISSION_DENIED_REPLY])
    expect(bot.bank.hasAccount('alice')).toBe(false)
  })
})
