export type { GraphosSettings, LogLevel } from './types'
export { DEFAULT_SETTINGS } from './DEFAULT_SETTINGS'
export type { ResolvedSettings, SettingsOverrides } from './parseSettings'
export { mergeSettings, resolveSettings } from './parseSettings'
