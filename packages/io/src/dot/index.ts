/**
 * DOT Export Module
 */

export { toDot, escapeLabel, dotOptionsSchema } from "./dot"
export type { DotOptions } from "./dot"
