export { MessageHistory, estimateMessageTokens, checkToolPairing } from './message-history.js';
export type { MessageHistoryOptions, TruncationInfo, ToolPairingReport } from './message-history.js';
