/**
 * Waypoint executor process
 * Hosts the entities named in ENTITIES and moves them on command
 */

import 'dotenv/config';
import { TopicSocket, MoveExecutor } from 'waypoint-client';
import { loadExecutorEnv } from './env.js';

async function main() {
  const env = loadExecutorEnv(process.env);
  console.warn(`Starting Waypoint executor against ${env.brokerUrl}...`);

  const socket = new TopicSocket({ serverUrl: env.brokerUrl, debug: env.debug });
  const executor = new MoveExecutor(socket, {
    entities: env.entities,
    commandTopic: env.commandTopic,
    feedbackTopic: env.feedbackTopic,
    tickRate: env.tickRate,
    debug: env.debug,
  });

  executor.on('moveStarted', (request) => {
    console.warn(
      `Moving ${request.objectName} to [${request.target.join(', ')}] over ${request.durationSeconds}s`
    );
  });

  executor.on('moveCompleted', (completion) => {
    console.warn(`${completion.objectName} reached [${completion.finalPosition.join(', ')}]`);
  });

  executor.on('commandRejected', (error, requestId) => {
    console.warn(`Rejected command ${requestId ?? '(no id)'}: ${error.kind}: ${error.message}`);
  });

  socket.on('reconnectFailed', () => {
    console.error('Lost the broker for good, exiting');
    process.exit(1);
  });

  try {
    await socket.connect();
    await executor.start();
  } catch (error) {
    console.error('Failed to start executor:', error);
    socket.disconnect();
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = () => {
    console.warn('Shutting down...');
    executor.stop();
    socket.disconnect();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

void main();
