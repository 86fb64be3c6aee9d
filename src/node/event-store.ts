import * as fs from 'fs';
import * as path from 'path';
import { LedgerState, MarketEvent, MarketEventType } from '../types';
import { TokenRegistryState } from '../token/token-types';
import { BalanceBookState } from '../payment/adapter';

export interface MarketSnapshot {
  ledger: LedgerState;
  tokens: TokenRegistryState;
  balances: BalanceBookState;
  savedAt: number;
}

export interface EventStore {
  saveEvent(event: MarketEvent): Promise<void>;
  getEvent(eventId: string): Promise<MarketEvent | null>;
  getEventsByHeight(startHeight: number, endHeight: number): Promise<MarketEvent[]>;
  getLatestHeight(): Promise<number>;
  saveSnapshot(snapshot: MarketSnapshot): Promise<void>;
  loadSnapshot(): Promise<MarketSnapshot | null>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const EVENT_TYPES: ReadonlySet<string> = new Set(Object.values(MarketEventType));

export function isMarketEvent(value: unknown): value is MarketEvent {
  return (
    isRecord(value) &&
    typeof value.eventId === 'string' &&
    typeof value.eventType === 'string' &&
    EVENT_TYPES.has(value.eventType) &&
    typeof value.height === 'number' &&
    typeof value.timestamp === 'number' &&
    typeof value.previousEventHash === 'string'
  );
}

export function isMarketSnapshot(value: unknown): value is MarketSnapshot {
  if (!isRecord(value) || typeof value.savedAt !== 'number') {
    return false;
  }

  const { ledger, tokens, balances } = value;
  return (
    isRecord(ledger) &&
    typeof ledger.address === 'string' &&
    typeof ledger.artist === 'string' &&
    typeof ledger.royaltyFee === 'number' &&
    isRecord(ledger.metadata) &&
    Array.isArray(ledger.items) &&
    Array.isArray(ledger.events) &&
    ledger.events.every(isMarketEvent) &&
    isRecord(tokens) &&
    Array.isArray(tokens.tokens) &&
    isRecord(balances) &&
    Array.isArray(balances.balances)
  );
}

export class FileEventStore implements EventStore {
  private dataDir: string;
  private eventsDir: string;
  private snapshotPath: string;

  constructor(dataDir: string) {
    this.dataDir = dataDir;
    this.eventsDir = path.join(dataDir, 'events');
    this.snapshotPath = path.join(dataDir, 'snapshot.json');

    this.ensureDirectories();
  }

  private ensureDirectories(): void {
    [this.dataDir, this.eventsDir].forEach(dir => {
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    });
  }

  async saveEvent(event: MarketEvent): Promise<void> {
    const eventPath = path.join(this.eventsDir, `${event.eventId}.json`);
    await fs.promises.writeFile(eventPath, JSON.stringify(event, null, 2));
  }

  async getEvent(eventId: string): Promise<MarketEvent | null> {
    const eventPath = path.join(this.eventsDir, `${eventId}.json`);

    if (!fs.existsSync(eventPath)) {
      return null;
    }

    return this.readEvent(eventPath);
  }

  async getEventsByHeight(startHeight: number, endHeight: number): Promise<MarketEvent[]> {
    const events = await this.readAllEvents();
    return events.filter(event => event.height >= startHeight && event.height <= endHeight);
  }

  async getLatestHeight(): Promise<number> {
    const events = await this.readAllEvents();
    return events.reduce((max, event) => Math.max(max, event.height), 0);
  }

  async saveSnapshot(snapshot: MarketSnapshot): Promise<void> {
    const tmpPath = `${this.snapshotPath}.tmp`;
    await fs.promises.writeFile(tmpPath, JSON.stringify(snapshot, null, 2));
    await fs.promises.rename(tmpPath, this.snapshotPath);
  }

  async loadSnapshot(): Promise<MarketSnapshot | null> {
    if (!fs.existsSync(this.snapshotPath)) {
      return null;
    }

    const data: unknown = JSON.parse(await fs.promises.readFile(this.snapshotPath, 'utf8'));
    if (!isMarketSnapshot(data)) {
      throw new Error(`Snapshot at ${this.snapshotPath} is malformed`);
    }
    return data;
  }

  private async readAllEvents(): Promise<MarketEvent[]> {
    const files = await fs.promises.readdir(this.eventsDir);
    const events: MarketEvent[] = [];

    for (const file of files) {
      if (!file.endsWith('.json')) {
        continue;
      }
      events.push(await this.readEvent(path.join(this.eventsDir, file)));
    }

    return events.sort((a, b) => a.height - b.height);
  }

  private async readEvent(eventPath: string): Promise<MarketEvent> {
    const data: unknown = JSON.parse(await fs.promises.readFile(eventPath, 'utf8'));
    if (!isMarketEvent(data)) {
      throw new Error(`Event file ${eventPath} is malformed`);
    }
    return data;
  }
}
