import type { SubscriberRole } from '../types/index.js';

/**
 * Socket.IO room that carries a topic's messages
 */
export function roomFor(topic: string): string {
  return `topic:${topic}`;
}

/**
 * Topic Registry
 * Tracks which clients hold which topics, and in which role.
 * Delivery itself goes through Socket.IO rooms.
 */
export class TopicRegistry {
  /** topic -> (clientId -> role) */
  private topics: Map<string, Map<string, SubscriberRole>> = new Map();

  /**
   * Record a subscription. Re-subscribing replaces the role.
   * @returns true when the client did not hold the topic before
   */
  add(clientId: string, topic: string, role: SubscriberRole): boolean {
    let subscribers = this.topics.get(topic);
    if (!subscribers) {
      subscribers = new Map();
      this.topics.set(topic, subscribers);
    }
    const isNew = !subscribers.has(clientId);
    subscribers.set(clientId, role);
    return isNew;
  }

  /**
   * @returns true when the client held the topic
   */
  remove(clientId: string, topic: string): boolean {
    const subscribers = this.topics.get(topic);
    if (!subscribers?.delete(clientId)) {
      return false;
    }
    if (subscribers.size === 0) {
      this.topics.delete(topic);
    }
    return true;
  }

  /**
   * Drop every subscription of a client
   * @returns the topics it held
   */
  removeClient(clientId: string): string[] {
    const removed: string[] = [];
    for (const topic of Array.from(this.topics.keys())) {
      if (this.remove(clientId, topic)) {
        removed.push(topic);
      }
    }
    return removed;
  }

  getSubscriberCount(topic: string, role?: SubscriberRole): number {
    const subscribers = this.topics.get(topic);
    if (!subscribers) return 0;
    if (!role) return subscribers.size;

    let count = 0;
    for (const subscriberRole of subscribers.values()) {
      if (subscriberRole === role) count++;
    }
    return count;
  }

  getTopics(): string[] {
    return Array.from(this.topics.keys());
  }

  clear(): void {
    this.topics.clear();
  }
}
