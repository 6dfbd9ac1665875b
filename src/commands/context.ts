import type { CommandContext, CommandUser } from './types.js'

export const DEFAULT_ROOM = 'public'

export interface CommandContextInit {
  user: CommandUser
  message: string
  command: string
  args: string
  room?: string
  /** Transport capability the reply functions forward to. */
  send(room: string, text: string): Promise<void>
}

/** Builds the context for one invocation. */
export function createCommandContext(init: CommandContextInit): CommandContext {
  const room = init.room ?? DEFAULT_ROOM
  const args = init.args.trim()
  const user = { ...init.user }

  return Object.freeze({
    user,
    message: init.message,
    args,
    argsList: Object.freeze(args ? args.split(/\s+/) : []),
    command: init.command.toLowerCase(),
    room,
    reply: (text: string) => init.send(room, text),
    replyMention: (text: string) => init.send(room, `@${user.displayName}: ${text}`)
  })
}
