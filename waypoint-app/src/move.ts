/**
 * Send one move command and wait for its completion feedback
 *
 * Usage: move <object> <x> <y> <z> [duration]
 */

import 'dotenv/config';
import { TopicSocket, MoveAgent } from 'waypoint-client';
import { loadAgentEnv, parseMoveArgs } from './env.js';
import { sendMove } from './sendMove.js';

async function main() {
  const env = loadAgentEnv(process.env);
  const args = parseMoveArgs(process.argv.slice(2));

  const socket = new TopicSocket({
    serverUrl: env.brokerUrl,
    autoReconnect: false,
    debug: env.debug,
  });
  const agent = new MoveAgent(socket, {
    commandTopic: env.commandTopic,
    feedbackTopic: env.feedbackTopic,
    debug: env.debug,
  });

  await socket.connect();
  await agent.start();

  const { feedback, exitCode } = await sendMove(agent, args, env.timeoutMs);
  console.log(JSON.stringify(feedback));
  process.exitCode = exitCode;

  agent.stop();
  socket.disconnect();
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
