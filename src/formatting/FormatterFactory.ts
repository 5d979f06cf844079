import { OutputFormat } from '../contracts'
import { DiffFormatter } from './Formatter'
import { JsonFormatter } from './formatters/JsonFormatter'
import { TextFormatter } from './formatters/TextFormatter'

/**
 * Factory for creating formatter instances based on configuration
 */
export class FormatterFactory {
  static createFormatter(format: OutputFormat = 'text'): DiffFormatter {
    switch (format) {
      case 'json':
        return new JsonFormatter()
      case 'text':
        return new TextFormatter()
    }
  }
}
