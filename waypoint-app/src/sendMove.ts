import type { MoveAgent } from 'waypoint-client';
import type { MoveCompletionFeedback } from 'waypoint-motion';
import type { MoveArgs } from './env.js';

export interface MoveOutcome {
  feedback: MoveCompletionFeedback;
  /** 0 only when the move succeeded */
  exitCode: number;
}

/**
 * Send one move through the agent and wait for its feedback
 * @throws Error when the command is invalid, cannot be sent or times out
 */
export async function sendMove(
  agent: MoveAgent,
  args: MoveArgs,
  timeoutMs: number
): Promise<MoveOutcome> {
  const sent = agent.initiateMove(args.objectName, args.target, args.durationSeconds);
  if (!sent.ok) {
    throw new Error(sent.error);
  }
  console.warn(sent.message);

  const feedback = await agent.waitForCompletion(sent.requestId, timeoutMs);
  return { feedback, exitCode: feedback.status === 'success' ? 0 : 1 };
}
