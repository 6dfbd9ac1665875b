import { formatAmount, parseWholeNumber, randomInt } from './format.js'
import type { BotModule, ModuleContext } from './types.js'

const SLOTS_COST = 5
const D20_COST = 5
const D20_WIN = 20
const D20_PENALTY = 10

export type BetParse = { ok: true; amount: number } | { ok: false; error: string }

/**
 * Reads a wager. `all`, `max` and `yolo` bet the whole balance, `half`
 * half of it (rounded down).
 */
export function parseBetAmount(text: string, balance: number, currency: string): BetParse {
  const token = text.trim().split(/\s+/)[0]?.toLowerCase() ?? ''
  if (!token) return { ok: false, error: 'Please specify an amount!' }

  if (token === 'all' || token === 'max' || token === 'yolo') return { ok: true, amount: balance }
  if (token === 'half') return { ok: true, amount: Math.floor(balance / 2) }

  const amount = parseWholeNumber(token)
  if (amount === null) return { ok: false, error: 'Amount must be a number!' }
  if (amount <= 0) return { ok: false, error: 'Amount must be positive!' }
  if (amount > balance) {
    return { ok: false, error: `You only have ${formatAmount(balance)} ${currency}!` }
  }
  return { ok: true, amount }
}

interface SlotSymbol {
  symbol: string
  weight: number
  /** Payout for three of a kind. */
  triple: number
  jackpot?: string
}

export const SLOT_SYMBOLS: readonly [SlotSymbol, ...SlotSymbol[]] = [
  { symbol: '7', weight: 5, triple: 5000, jackpot: 'JACKPOT 777' },
  { symbol: 'Bell', weight: 8, triple: 420, jackpot: 'BELL BONUS' },
  { symbol: 'Star', weight: 10, triple: 500, jackpot: 'STAR BONUS' },
  { symbol: 'Bar', weight: 10, triple: 350, jackpot: 'BAR BONUS' },
  { symbol: 'Cherry', weight: 20, triple: 100 },
  { symbol: 'Lemon', weight: 20, triple: 75 },
  { symbol: 'Orange', weight: 15, triple: 80 },
  { symbol: 'Grape', weight: 12, triple: 90 }
]
const SLOT_PAIR_PAYOUT = 15
const SLOT_CHERRY_PAYOUT = 5

function spinReel(random: () => number): SlotSymbol {
  const total = SLOT_SYMBOLS.reduce((sum, s) => sum + s.weight, 0)
  const roll = random() * total
  let cumulative = 0
  let picked = SLOT_SYMBOLS[0]
  for (const entry of SLOT_SYMBOLS) {
    cumulative += entry.weight
    picked = entry
    if (roll < cumulative) break
  }
  return picked
}

export function scoreSlots(reels: readonly [SlotSymbol, SlotSymbol, SlotSymbol]): {
  payout: number
  jackpot?: string
} {
  const [a, b, c] = reels
  if (a.symbol === b.symbol && b.symbol === c.symbol) {
    return a.jackpot ? { payout: a.triple, jackpot: a.jackpot } : { payout: a.triple }
  }
  if (a.symbol === b.symbol || b.symbol === c.symbol || a.symbol === c.symbol) {
    return { payout: SLOT_PAIR_PAYOUT }
  }
  if (reels.some((r) => r.symbol === 'Cherry')) return { payout: SLOT_CHERRY_PAYOUT }
  return { payout: 0 }
}

const ROLL_PRIZES: Record<number, { prize: number; label: string }> = {
  2: { prize: 25, label: 'DUBS' },
  3: { prize: 100, label: 'TRIPS' },
  4: { prize: 1000, label: 'QUADS' },
  5: { prize: 10000, label: 'QUINTS' },
  6: { prize: 50000, label: 'SEXTUPLES' }
}

/** Prize for a six-digit roll, by how many trailing digits repeat. */
export function scoreRoll(digits: string): { prize: number; label: string } | null {
  if (digits === '000000') return { prize: 10000, label: 'ABSOLUTE ZERO' }

  const last = digits[digits.length - 1]
  let run = 0
  for (let i = digits.length - 1; i >= 0 && digits[i] === last; i--) run++
  return ROLL_PRIZES[run] ?? null
}

const RED_NUMBERS = new Set([1, 3, 5, 7, 9, 12, 14, 16, 18, 19, 21, 23, 25, 27, 30, 32, 34, 36])

/**
 * Whether a roulette `bet` wins on `result`, and its multiplier.
 * `null` for an unrecognised bet.
 */
export function settleRoulette(bet: string, result: number): { win: boolean; multiplier: number } | null {
  const number = parseWholeNumber(bet)
  if (number !== null) {
    if (number < 0 || number > 36) return null
    return { win: number === result, multiplier: 35 }
  }

  const isRed = RED_NUMBERS.has(result)
  switch (bet) {
    case 'red':
      return { win: isRed, multiplier: 2 }
    case 'black':
      return { win: result !== 0 && !isRed, multiplier: 2 }
    case 'odd':
      return { win: result % 2 === 1, multiplier: 2 }
    case 'even':
      return { win: result !== 0 && result % 2 === 0, multiplier: 2 }
    case 'low':
      return { win: result >= 1 && result <= 18, multiplier: 2 }
    case 'high':
      return { win: result >= 19 && result <= 36, multiplier: 2 }
    default:
      return null
  }
}

function rouletteColor(result: number): string {
  if (result === 0) return 'Green'
  return RED_NUMBERS.has(result) ? 'Red' : 'Black'
}

/**
 * Games of chance played with the bank's currency.
 */
export function gamblingModule(): BotModule {
  return {
    name: 'gambling',
    setup(ctx: ModuleContext) {
      const { registry, bank, config, random } = ctx
      const p = config.commandPrefix
      const currency = config.economy.currencyName

      registry.register({
        name: 'gamble',
        aliases: ['bet'],
        group: 'gambling',
        description: 'Chance to double your bet',
        usage: `${p}gamble <amount|all|half>`,
        async handler(cmd, args) {
          const username = cmd.user.username
          const balance = await bank.ensureAccount(username)
          const bet = parseBetAmount(args, balance, currency)
          if (!bet.ok) {
            await cmd.reply(bet.error)
            return
          }
          if (bet.amount === 0) {
            await cmd.reply(`You need ${currency} to gamble!`)
            return
          }

          if (random() < config.gambling.winRate) {
            const next = await bank.adjust(username, bet.amount)
            await cmd.reply(
              `${cmd.user.displayName} WON ${formatAmount(bet.amount * 2)} ${currency}! Balance: ${formatAmount(next)}`
            )
          } else {
            const next = await bank.adjust(username, -bet.amount)
            await cmd.reply(
              `${cmd.user.displayName} lost ${formatAmount(bet.amount)} ${currency}... Balance: ${formatAmount(next)}`
            )
          }
        }
      })

      registry.register({
        name: 'coinflip',
        aliases: ['cf', 'flip'],
        group: 'gambling',
        description: 'Flip a coin, 50/50 odds',
        usage: `${p}coinflip <amount> <heads|tails>`,
        async handler(cmd) {
          const [rawAmount, rawChoice] = cmd.argsList
          if (!rawAmount || !rawChoice) {
            await cmd.reply(`Usage: ${p}coinflip <amount> <heads|tails>`)
            return
          }

          const username = cmd.user.username
          const balance = await bank.ensureAccount(username)
          const bet = parseBetAmount(rawAmount, balance, currency)
          if (!bet.ok) {
            await cmd.reply(bet.error)
            return
          }
          if (bet.amount === 0) {
            await cmd.reply(`You need ${currency} to flip!`)
            return
          }

          const choice = rawChoice.toLowerCase()
          if (!['heads', 'tails', 'h', 't'].includes(choice)) {
            await cmd.reply('Pick heads or tails!')
            return
          }
          const pick = choice.startsWith('h') ? 'heads' : 'tails'
          const result = random() < 0.5 ? 'heads' : 'tails'

          if (pick === result) {
            await bank.adjust(username, bet.amount)
            await cmd.reply(`It's ${result}! ${cmd.user.displayName} won ${formatAmount(bet.amount * 2)} ${currency}!`)
          } else {
            await bank.adjust(username, -bet.amount)
            await cmd.reply(`It's ${result}! ${cmd.user.displayName} lost ${formatAmount(bet.amount)} ${currency}`)
          }
        }
      })

      registry.register({
        name: 'slots',
        aliases: ['slot'],
        group: 'gambling',
        description: `Play the slot machine! Costs ${SLOTS_COST} ${currency}.`,
        usage: `${p}slots`,
        async handler(cmd) {
          const username = cmd.user.username
          const balance = await bank.ensureAccount(username)
          if (balance < SLOTS_COST) {
            await cmd.reply(`You need ${SLOTS_COST} ${currency} to play slots!`)
            return
          }

          const reels = [spinReel(random), spinReel(random), spinReel(random)] as const
          const { payout, jackpot } = scoreSlots(reels)
          const display = reels.map((r) => `[${r.symbol}]`).join(' ')

          await bank.setBalance(username, balance - SLOTS_COST + payout)
          if (payout === 0) {
            await cmd.reply(`${display} No win. [-${SLOTS_COST} ${currency}]`)
          } else if (jackpot) {
            await cmd.reply(`${display} *** ${jackpot}! *** ${cmd.user.displayName} wins ${formatAmount(payout)} ${currency}!`)
          } else {
            await cmd.reply(`${display} ${cmd.user.displayName} wins ${formatAmount(payout)} ${currency}!`)
          }
        }
      })

      registry.register({
        name: 'd20',
        group: 'gambling',
        description: `Roll a D20! Costs ${D20_COST}. Nat 20 wins ${D20_WIN}, nat 1 loses ${D20_PENALTY} more.`,
        usage: `${p}d20`,
        async handler(cmd) {
          const username = cmd.user.username
          const balance = await bank.ensureAccount(username)
          if (balance < D20_COST) {
            await cmd.reply(`You need ${D20_COST} ${currency} to roll!`)
            return
          }

          const afterCost = balance - D20_COST
          const roll = randomInt(random, 1, 20)
          if (roll === 20) {
            await bank.setBalance(username, afterCost + D20_WIN)
            await cmd.reply(`${cmd.user.displayName} rolled a NAT 20! [+${D20_WIN} ${currency}]`)
          } else if (roll === 1) {
            await bank.setBalance(username, Math.max(0, afterCost - D20_PENALTY))
            await cmd.reply(
              `${cmd.user.displayName} rolled a NAT 1! Critical fail! [-${D20_PENALTY + D20_COST} ${currency}]`
            )
          } else {
            await bank.setBalance(username, afterCost)
            await cmd.reply(`${cmd.user.displayName} rolled a ${roll}. [-${D20_COST} ${currency}]`)
          }
        }
      })

      registry.register({
        name: 'roll',
        aliases: ['dice'],
        group: 'gambling',
        description: 'Roll six digits; repeated trailing digits win prizes (free)',
        usage: `${p}roll`,
        async handler(cmd) {
          const digits = String(randomInt(random, 0, 999_999)).padStart(6, '0')
          const prize = scoreRoll(digits)
          if (!prize) {
            await cmd.reply(`${cmd.user.displayName} rolled ${digits}`)
            return
          }
          await bank.ensureAccount(cmd.user.username)
          await bank.adjust(cmd.user.username, prize.prize)
          await cmd.reply(
            `${cmd.user.displayName} rolled ${digits} - ${prize.label}! +${formatAmount(prize.prize)} ${currency}!`
          )
        }
      })

      registry.register({
        name: 'roulette',
        aliases: ['rl'],
        group: 'gambling',
        description: 'Bet on roulette numbers or colors',
        usage: `${p}roulette <amount> on <number|red|black|odd|even|low|high>`,
        async handler(cmd, args) {
          const parts = args.toLowerCase().split(' on ')
          const [rawAmount, rawBet] = parts
          if (parts.length !== 2 || rawAmount === undefined || rawBet === undefined) {
            await cmd.reply(`Usage: ${p}roulette <amount> on <number|red|black|odd|even|low|high>`)
            return
          }

          const username = cmd.user.username
          const balance = await bank.ensureAccount(username)
          const bet = parseBetAmount(rawAmount, balance, currency)
          if (!bet.ok) {
            await cmd.reply(bet.error)
            return
          }
          if (bet.amount === 0) {
            await cmd.reply(`You need ${currency} to play roulette!`)
            return
          }

          const result = randomInt(random, 0, 36)
          const outcome = settleRoulette(rawBet.trim(), result)
          if (!outcome) {
            await cmd.reply('Invalid bet! Use: number (0-36), red, black, odd, even, low, high')
            return
          }

          const label = `[${rouletteColor(result)} ${result}]`
          if (outcome.win) {
            const winnings = bet.amount * outcome.multiplier
            await bank.adjust(username, winnings - bet.amount)
            await cmd.reply(
              `${label} ${cmd.user.displayName} wins ${formatAmount(winnings)} ${currency}! (x${outcome.multiplier})`
            )
          } else {
            await bank.adjust(username, -bet.amount)
            await cmd.reply(`${label} ${cmd.user.displayName} loses ${formatAmount(bet.amount)} ${currency}`)
          }
        }
      })
    }
  }
}
