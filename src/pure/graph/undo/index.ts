export type { History, HistoryStep } from './history'
export { EMPTY_HISTORY, HISTORY_LIMIT, recordDelta, stepBack, stepForward } from './history'
export { reverseDelta } from './reverseDelta'
export { rebaseHistoryDelta } from './rebaseHistoryDelta'
