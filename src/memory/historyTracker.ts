import { Clock, ConfidenceLevel, HistoryFilters, Intent, IntentType, Sentiment, isIntentType } from '../types';
import { childLogger } from '../utils/logger';

const log = childLogger('history');

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export interface HistoryTrackerOptions {
  capacity?: number;
  now?: Clock;
}

export interface IntentCount {
  type: IntentType;
  count: number;
}

export interface ConfidenceStats {
  avg: number;
  min: number;
  max: number;
  count: number;
}

export interface HourlyVolume {
  hour: string;
  count: number;
}

export interface UserPatterns {
  userId: string;
  totalIntents: number;
  topIntents: IntentCount[];
  avgConfidence: number;
  preferredLanguage: string;
  mostActiveHour: number;
  intentsLast24h: number;
}

export interface HistorySummary {
  capacity: number;
  totalIntents: number;
  uniqueUsers: number;
  intentsLastHour: number;
  intentsLast24h: number;
  topIntents: IntentCount[];
  confidence: ConfidenceStats;
  confidenceDistribution: Partial<Record<ConfidenceLevel, number>>;
  sentimentDistribution: Partial<Record<Sentiment, number>>;
}

interface HistoryEntry {
  intent: Intent;
  userId?: string;
}

const removeEntry = <K>(index: Map<K, HistoryEntry[]>, key: K, entry: HistoryEntry): void => {
  const entries = index.get(key);
  if (!entries) {
    return;
  }
  const position = entries.indexOf(entry);
  if (position >= 0) {
    entries.splice(position, 1);
  }
  if (entries.length === 0) {
    index.delete(key);
  }
};

const addEntry = <K>(index: Map<K, HistoryEntry[]>, key: K, entry: HistoryEntry): void => {
  const entries = index.get(key);
  if (entries) {
    entries.push(entry);
  } else {
    index.set(key, [entry]);
  }
};

const countBy = <K extends string>(intents: Intent[], key: (intent: Intent) => K | undefined): Partial<Record<K, number>> => {
  const counts: Partial<Record<K, number>> = {};
  for (const intent of intents) {
    const value = key(intent);
    if (value !== undefined) {
      counts[value] = (counts[value] ?? 0) + 1;
    }
  }
  return counts;
};

// First key with the highest count.
const mostCommon = <K>(entries: Iterable<[K, number]>): K | undefined => {
  let best: K | undefined;
  let bestCount = 0;
  for (const [key, count] of entries) {
    if (count > bestCount) {
      best = key;
      bestCount = count;
    }
  }
  return best;
};

/**
 * Bounded in-memory log of classified intents with secondary indexes by user
 * and by intent type. When the log is full the oldest entry is evicted from
 * the log and from both indexes.
 */
export class IntentHistoryTracker {
  private log: HistoryEntry[] = [];
  private byUser = new Map<string, HistoryEntry[]>();
  private byType = new Map<IntentType, HistoryEntry[]>();
  readonly capacity: number;
  private readonly now: Clock;

  constructor(options: HistoryTrackerOptions = {}) {
    this.capacity = Math.max(1, options.capacity ?? 10_000);
    this.now = options.now ?? Date.now;
  }

  track(intent: Intent, userId?: string): void {
    const entry: HistoryEntry = { intent, userId };
    this.log.push(entry);
    addEntry(this.byType, intent.type, entry);
    if (userId) {
      addEntry(this.byUser, userId, entry);
    }

    while (this.log.length > this.capacity) {
      const evicted = this.log.shift();
      if (!evicted) {
        break;
      }
      removeEntry(this.byType, evicted.intent.type, evicted);
      if (evicted.userId) {
        removeEntry(this.byUser, evicted.userId, evicted);
      }
    }
    log.debug(`Tracked ${intent.type} (total=${this.log.length})`);
  }

  get size(): number {
    return this.log.length;
  }

  getHistory(filters: HistoryFilters = {}): Intent[] {
    const { userId, intentType, since, limit } = filters;
    let entries: HistoryEntry[];
    if (userId) {
      entries = this.byUser.get(userId) ?? [];
    } else if (intentType) {
      entries = this.byType.get(intentType) ?? [];
    } else {
      entries = this.log;
    }

    let intents = entries.map((entry) => entry.intent);
    if (intentType) {
      intents = intents.filter((intent) => intent.type === intentType);
    }
    if (since !== undefined) {
      intents = intents.filter((intent) => intent.timestamp >= since);
    }
    if (limit !== undefined) {
      intents = limit > 0 ? intents.slice(-limit) : [];
    }
    return intents;
  }

  getFrequency(userId?: string, since?: number): Partial<Record<IntentType, number>> {
    return countBy(this.getHistory({ userId, since }), (intent) => intent.type);
  }

  getTopIntents(n = 10, userId?: string, since?: number): IntentCount[] {
    const frequency = this.getFrequency(userId, since);
    const counts = Object.entries(frequency).flatMap(([type, count]): IntentCount[] =>
      isIntentType(type) && count !== undefined ? [{ type, count }] : [],
    );
    return counts.sort((a, b) => b.count - a.count).slice(0, Math.max(0, n));
  }

  getConfidenceStats(intentType?: IntentType, userId?: string, since?: number): ConfidenceStats {
    const confidences = this.getHistory({ userId, intentType, since }).map((intent) => intent.confidence);
    if (confidences.length === 0) {
      return { avg: 0, min: 0, max: 0, count: 0 };
    }
    return {
      avg: confidences.reduce((sum, value) => sum + value, 0) / confidences.length,
      min: Math.min(...confidences),
      max: Math.max(...confidences),
      count: confidences.length,
    };
  }

  getConfidenceDistribution(
    intentType?: IntentType,
    userId?: string,
    since?: number,
  ): Partial<Record<ConfidenceLevel, number>> {
    return countBy(this.getHistory({ userId, intentType, since }), (intent) => intent.confidenceLevel);
  }

  getSentimentDistribution(intentType?: IntentType, userId?: string, since?: number): Partial<Record<Sentiment, number>> {
    return countBy(this.getHistory({ userId, intentType, since }), (intent) => intent.sentiment);
  }

  // Buckets are UTC hours, oldest first.
  getHourlyVolume(hours = 24, userId?: string): HourlyVolume[] {
    const since = this.now() - hours * HOUR_MS;
    const buckets = new Map<number, number>();
    for (const intent of this.getHistory({ userId, since })) {
      const hour = Math.floor(intent.timestamp / HOUR_MS) * HOUR_MS;
      buckets.set(hour, (buckets.get(hour) ?? 0) + 1);
    }
    return Array.from(buckets.entries())
      .sort(([a], [b]) => a - b)
      .map(([hour, count]) => ({ hour: new Date(hour).toISOString(), count }));
  }

  getUserPatterns(userId: string): UserPatterns | undefined {
    const intents = this.getHistory({ userId });
    if (intents.length === 0) {
      return undefined;
    }

    const languages = new Map<string, number>();
    const hours = new Map<number, number>();
    for (const intent of intents) {
      languages.set(intent.language, (languages.get(intent.language) ?? 0) + 1);
      const hour = new Date(intent.timestamp).getUTCHours();
      hours.set(hour, (hours.get(hour) ?? 0) + 1);
    }
    const dayAgo = this.now() - DAY_MS;

    return {
      userId,
      totalIntents: intents.length,
      topIntents: this.getTopIntents(5, userId),
      avgConfidence: intents.reduce((sum, intent) => sum + intent.confidence, 0) / intents.length,
      preferredLanguage: mostCommon(languages.entries()) ?? 'en',
      mostActiveHour: mostCommon(Array.from(hours.entries()).sort(([a], [b]) => a - b)) ?? 0,
      intentsLast24h: intents.filter((intent) => intent.timestamp >= dayAgo).length,
    };
  }

  getSummary(): HistorySummary {
    const now = this.now();
    const intents = this.log.map((entry) => entry.intent);
    return {
      capacity: this.capacity,
      totalIntents: intents.length,
      uniqueUsers: this.byUser.size,
      intentsLastHour: intents.filter((intent) => intent.timestamp >= now - HOUR_MS).length,
      intentsLast24h: intents.filter((intent) => intent.timestamp >= now - DAY_MS).length,
      topIntents: this.getTopIntents(10),
      confidence: this.getConfidenceStats(),
      confidenceDistribution: this.getConfidenceDistribution(),
      sentimentDistribution: this.getSentimentDistribution(),
    };
  }

  clearUserHistory(userId: string): number {
    const entries = this.byUser.get(userId);
    if (!entries) {
      return 0;
    }
    const removed = new Set(entries);
    this.log = this.log.filter((entry) => !removed.has(entry));
    entries.forEach((entry) => removeEntry(this.byType, entry.intent.type, entry));
    this.byUser.delete(userId);
    log.info(`Cleared ${removed.size} history entries for user ${userId}`);
    return removed.size;
  }

  clear(): void {
    this.log = [];
    this.byUser.clear();
    this.byType.clear();
  }
}
