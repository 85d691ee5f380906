export enum EngineEventType {
  CHECKPOINT_SAVED = 'conversation.checkpoint.saved',
  TURN_COMPLETED = 'conversation.turn.completed',
  TURN_INTERRUPTED = 'conversation.turn.interrupted',
  TURN_FAILED = 'conversation.turn.failed',
}
