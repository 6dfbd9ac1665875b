import { PassThrough } from 'node:stream'
import { describe, expect, it } from 'vitest'

import { CliChannel } from '../src/channels/cli.js'
import { MessageBus } from '../src/core/bus.js'
import { makeConfig, makeLogger } from './helpers.js'

function setup(enabled = true) {
  const input = new PassThrough()
  const output = new PassThrough()
  const bus = new MessageBus()
  const config = makeConfig('/tmp/reelbot-cli', enabled ? { CLI_ENABLED: 'true' } : {})
  const channel = new CliChannel(config, bus, makeLogger(), { input, output })
  const written = () => String(output.read() ?? '')
  return { input, bus, channel, written }
}

describe('CliChannel', () => {
  it('publishes each stdin line as a chat message from the local user', async () => {
    const { input, bus, channel } = setup()

    await channel.start()
    input.write('  !balance  \n')

    const inbound = await bus.consumeInbound()
    expect(inbound).toMatchObject({
      channel: 'cli',
      senderId: 'local-user',
      senderName: 'local-user',
      chatId: 'public',
      content: '!balance'
    })
    await channel.stop()
  })

  it('greets with the help command and prompts with the username', async () => {
    const { channel, written } = setup()

    await channel.start()

    expect(written()).toBe('CLI channel enabled. Try !help.\nlocal-user> ')
    await channel.stop()
  })

  it('prints replies for the cli channel only', async () => {
    const { channel, written } = setup()

    await channel.start()
    written()

    await channel.send({ channel: 'cli', chatId: 'public', content: 'done' })
    await channel.send({ channel: 'cli', chatId: 'public', content: '   ' })
    await channel.send({ channel: 'chat', chatId: 'public', content: 'elsewhere' })

    expect(written()).toBe('bot> done\nlocal-user> ')
    await channel.stop()
  })

  it('does nothing when disabled', async () => {
    const { channel, written } = setup(false)

    await channel.start()
    await channel.send({ channel: 'cli', chatId: 'public', content: 'done' })

    expect(written()).toBe('')
  })
})
