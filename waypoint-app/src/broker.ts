/**
 * Waypoint broker process
 * Configured through environment variables (see .env.example)
 */

import 'dotenv/config';
import { Waypoint } from 'waypoint-server';
import { loadBrokerConfig } from './env.js';

async function main() {
  console.warn('Starting Waypoint broker...');
  console.warn(`Environment: ${process.env.NODE_ENV || 'development'}`);

  const waypoint = new Waypoint(loadBrokerConfig(process.env));
  const config = waypoint.getConfig();
  console.warn(`Command topic: ${config.commandTopic}`);
  console.warn(`Feedback topic: ${config.feedbackTopic} (answered by ${config.feedbackMode})`);

  // Event handlers
  waypoint.on('subscribed', (clientId, topic, role) => {
    console.warn(`Client ${clientId} subscribed to ${topic} as ${role}`);
  });

  waypoint.on('client-disconnected', (clientId, reason) => {
    console.warn(`Client ${clientId} disconnected: ${reason}`);
  });

  waypoint.on('hook-error', (hookId, error) => {
    console.error(`Hook ${hookId} failed: ${error.message}`);
  });

  try {
    await waypoint.start();
    console.warn(`Waypoint broker running on port ${config.port}`);
  } catch (error) {
    console.error('Failed to start broker:', error);
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = () => {
    console.warn('Shutting down...');
    void waypoint.stop().then(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

void main();
