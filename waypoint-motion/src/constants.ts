/** Topic carrying MoveCommand payloads */
export const COMMAND_TOPIC = 'scene/commands/move';

/** Topic carrying MoveCompletionFeedback payloads */
export const FEEDBACK_TOPIC = 'scene/feedback/move_complete';

/** Used when a command has no positive duration */
export const DEFAULT_MOVE_DURATION_SECONDS = 2.0;
