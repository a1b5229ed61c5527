/**
 * Errors Module
 */

export {
  GraphError,
  SizeMismatchError,
  ArcNotFoundError,
  ArcAlreadyExistsError,
  InvalidOptionsError,
} from './errors'
export type { OptionIssue } from './errors'
