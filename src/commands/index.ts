export * from './types'
export { CommandRegistry } from './CommandRegistry'
export { CompareCommand } from './CompareCommand'
export { SummaryCommand } from './SummaryCommand'
export { VersionCommand } from './VersionCommand'
export { HelpCommand } from './HelpCommand'

import { CompareCommand } from './CompareCommand'
import { SummaryCommand } from './SummaryCommand'
import { VersionCommand } from './VersionCommand'
import { HelpCommand } from './HelpCommand'

export const defaultCommands = [
  CompareCommand,
  SummaryCommand,
  VersionCommand,
  HelpCommand,
]
