export { CommandRegistry, PERMISSION_DENIED_REPLY, COMMAND_FAILED_REPLY, cooldownReply } from './registry.js'
export type { CommandRegistryOptions } from './registry.js'
export { CommandHandler } from './handler.js'
export type { CommandFallback, ParsedCommand } from './handler.js'
export { PermissionEvaluator } from './permissions.js'
export { CooldownTracker } from './cooldown.js'
export { createCommandContext, DEFAULT_ROOM } from './context.js'
export { PermissionLevel } from './types.js'
export type {
  CommandContext,
  CommandHandlerFn,
  CommandRegistration,
  CommandSpec,
  CommandUser,
  ListCommandsOptions,
  PostCommandHook,
  PreCommandHook,
  PreHookVerdict
} from './types.js'
