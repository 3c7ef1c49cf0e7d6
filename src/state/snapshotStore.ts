import logger from '../logger';
import type { ForecastSnapshot } from '../types/forecast';

export interface SnapshotReader {
  getLatest(): ForecastSnapshot | null;
}

export type SnapshotListener = (snapshot: ForecastSnapshot) => void | Promise<void>;

/**
 * Single-writer slot holding the most recently published forecast snapshot.
 * Publishing swaps the whole reference; readers never see a partial update.
 */
export class SnapshotStore implements SnapshotReader {
  private current: ForecastSnapshot | null = null;
  private readonly listeners = new Set<SnapshotListener>();

  publish(snapshot: ForecastSnapshot): void {
    this.current = snapshot;
    for (const listener of this.listeners) {
      try {
        Promise.resolve(listener(snapshot)).catch((err: unknown) => {
          logger.error({ err, fingerprint: snapshot.fingerprint }, '[snapshot] subscriber failed');
        });
      } catch (err) {
        logger.error({ err, fingerprint: snapshot.fingerprint }, '[snapshot] subscriber failed');
      }
    }
  }

  getLatest(): ForecastSnapshot | null {
    return this.current;
  }

  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
