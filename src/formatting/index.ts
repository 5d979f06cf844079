export type { DiffFormatter, FormatOptions } from './Formatter'
export { FormatterFactory } from './FormatterFactory'
export { BaseFormatter } from './formatters/BaseFormatter'
export { TextFormatter } from './formatters/TextFormatter'
export { JsonFormatter } from './formatters/JsonFormatter'
