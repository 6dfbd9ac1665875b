import { PermissionLevel } from '../commands/types.js'
import { formatAmount, parseWholeNumber, targetName } from './format.js'
import type { BotModule, ModuleContext } from './types.js'

const LEADERBOARD_SIZE = 5

/**
 * Currency accounts: balance, transfers, lookup and the leaderboard.
 */
export function economyModule(): BotModule {
  return {
    name: 'economy',
    setup(ctx: ModuleContext) {
      const { registry, bank, config } = ctx
      const p = config.commandPrefix
      const currency = config.economy.currencyName

      registry.register({
        name: 'balance',
        aliases: ['bal', 'wallet'],
        group: 'economy',
        description: `Check your ${currency} balance (opens an account if needed)`,
        usage: `${p}balance`,
        async handler(cmd) {
          const balance = bank.balanceOf(cmd.user.username)
          if (balance === undefined) {
            const opening = await bank.ensureAccount(cmd.user.username)
            await cmd.reply(`Welcome! You've been given ${formatAmount(opening)} ${currency} to start!`)
            return
          }
          await cmd.reply(`${cmd.user.displayName} has ${formatAmount(balance)} ${currency}`)
        }
      })

      registry.register({
        name: 'give',
        aliases: ['pay', 'transfer'],
        group: 'economy',
        description: `Give ${currency} to another user`,
        usage: `${p}give <username> <amount>`,
        async handler(cmd) {
          const [rawTarget, rawAmount] = cmd.argsList
          if (!rawTarget || !rawAmount) {
            await cmd.reply(`Usage: ${p}give <username> <amount>`)
            return
          }

          const target = targetName(rawTarget)
          const amount = parseWholeNumber(rawAmount)
          if (amount === null) {
            await cmd.reply('Amount must be a number!')
            return
          }
          if (amount <= 0) {
            await cmd.reply('Amount must be positive!')
            return
          }
          if (target === cmd.user.username.toLowerCase()) {
            await cmd.reply(`You can't give ${currency} to yourself!`)
            return
          }

          const senderBalance = bank.balanceOf(cmd.user.username)
          if (senderBalance === undefined) {
            await cmd.reply(`You don't have an account! Use ${p}balance first.`)
            return
          }
          if (amount > senderBalance) {
            await cmd.reply(`You only have ${formatAmount(senderBalance)} ${currency}!`)
            return
          }
          const targetBalance = bank.balanceOf(target)
          if (targetBalance === undefined) {
            await cmd.reply(`${target} doesn't have an account yet!`)
            return
          }

          await bank.setBalance(cmd.user.username, senderBalance - amount)
          await bank.setBalance(target, targetBalance + amount)
          await cmd.reply(`${cmd.user.displayName} gave ${formatAmount(amount)} ${currency} to ${target}`)
        }
      })

      registry.register({
        name: 'checkbal',
        aliases: ['cb'],
        group: 'economy',
        description: "Check another user's balance",
        usage: `${p}checkbal <username>`,
        async handler(cmd) {
          const [rawTarget] = cmd.argsList
          if (!rawTarget) {
            await cmd.reply(`Usage: ${p}checkbal <username>`)
            return
          }
          const target = targetName(rawTarget)
          const balance = bank.balanceOf(target)
          await cmd.reply(
            balance === undefined
              ? `${target} doesn't have an account yet!`
              : `${target} has ${formatAmount(balance)} ${currency}`
          )
        }
      })

      registry.register({
        name: 'leaderboard',
        aliases: ['lb', 'top', 'rich'],
        group: 'economy',
        description: `Show the top ${LEADERBOARD_SIZE} richest users`,
        usage: `${p}leaderboard`,
        async handler(cmd) {
          const top = bank.top(LEADERBOARD_SIZE)
          if (top.length === 0) {
            await cmd.reply(`No one has any ${currency} yet!`)
            return
          }
          const ranking = top
            .map((entry, i) => `${i + 1}. ${entry.username}: ${formatAmount(entry.balance)}`)
            .join(' | ')
          await cmd.reply(`Richest: ${ranking}`)
        }
      })

      registry.register({
        name: 'setbal',
        permission: PermissionLevel.Admin,
        hidden: true,
        group: 'economy',
        description: "Set a user's balance",
        usage: `${p}setbal <username> <amount>`,
        async handler(cmd) {
          const [rawTarget, rawAmount] = cmd.argsList
          if (!rawTarget || !rawAmount) {
            await cmd.reply(`Usage: ${p}setbal <username> <amount>`)
            return
          }
          const amount = parseWholeNumber(rawAmount)
          if (amount === null || amount < 0) {
            await cmd.reply('Amount must be a non-negative number!')
            return
          }
          const target = targetName(rawTarget)
          await bank.setBalance(target, amount)
          ctx.logger.info('economy.balance_set', { by: cmd.user.username, target, amount })
          await cmd.reply(`Set ${target}'s balance to ${formatAmount(amount)} ${currency}`)
        }
      })
    }
  }
}
