/**
 * State Persistence
 *
 * Durable snapshot of every managed device: address, configuration,
 * collapsed last-known state and metrics. The JSON store writes through a
 * temp file and rename so a crash never leaves a half-written snapshot.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { getComponentLogger } from '../infrastructure/logger/index.js';
import { PersistenceError, getErrorMessage } from '../core/errors.js';
import { STATE_SNAPSHOT_VERSION } from '../config/constants.js';
import {
  ConnectionState,
  connectionConfigSchema,
  connectionMetricsSchema,
  type ConnectionConfig,
  type ConnectionMetrics,
} from '../connection/types.js';
import type { DeviceAddress, Timestamp } from '../core/types.js';

const logger = getComponentLogger('StateStore');

// =============================================================================
// SNAPSHOT SCHEMA
// =============================================================================

export interface DeviceRecord {
  address: DeviceAddress;
  config: ConnectionConfig;
  state: ConnectionState;
  metrics: ConnectionMetrics;
  pausedUntil: Timestamp | null;
}

export interface StateSnapshot {
  version: number;
  savedAt: Timestamp;
  devices: DeviceRecord[];
}

const deviceRecordSchema = z.object({
  address: z.string().min(1),
  config: connectionConfigSchema,
  state: z.nativeEnum(ConnectionState),
  metrics: connectionMetricsSchema,
  pausedUntil: z.number().nullable().default(null),
});

const snapshotSchema = z.object({
  version: z.literal(STATE_SNAPSHOT_VERSION),
  savedAt: z.number(),
  devices: z.array(deviceRecordSchema),
});

// =============================================================================
// STATE COLLAPSING
// =============================================================================

/**
 * State written to disk. In-flight states cannot survive a restart.
 */
export function collapseState(state: ConnectionState): ConnectionState {
  switch (state) {
    case ConnectionState.CONNECTING:
    case ConnectionState.RECONNECTING:
      return ConnectionState.DISCONNECTED;
    case ConnectionState.DEGRADED:
      return ConnectionState.CONNECTED;
    default:
      return state;
  }
}

/**
 * State a device starts in after restore. Links are never live after a
 * restart; disabled, paused and failed devices keep their state.
 */
export function restoredState(state: ConnectionState): ConnectionState {
  switch (state) {
    case ConnectionState.DISABLED:
    case ConnectionState.PAUSED:
    case ConnectionState.FAILED:
      return state;
    default:
      return ConnectionState.DISCONNECTED;
  }
}

// =============================================================================
// STORE INTERFACE
// =============================================================================

export interface StateStore {
  /** Null when nothing has been saved yet */
  load(): Promise<StateSnapshot | null>;
  save(snapshot: StateSnapshot): Promise<void>;
  remove(address: DeviceAddress): Promise<void>;
}

// =============================================================================
// JSON FILE STORE
// =============================================================================

export class JsonStateStore implements StateStore {
  private writeChain: Promise<void> = Promise.resolve();

  constructor(readonly filePath: string) {}

  async load(): Promise<StateSnapshot | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        logger.debug('No state file found', { filePath: this.filePath });
        return null;
      }
      throw new PersistenceError('Failed to read state file', {
        filePath: this.filePath,
        error: getErrorMessage(error),
      });
    }

    return this.parse(raw);
  }

  save(snapshot: StateSnapshot): Promise<void> {
    return this.enqueue(() => this.write(snapshot));
  }

  remove(address: DeviceAddress): Promise<void> {
    return this.enqueue(async () => {
      const current = await this.load();
      if (!current || !current.devices.some(d => d.address === address)) {
        return;
      }

      await this.write({
        ...current,
        devices: current.devices.filter(d => d.address !== address),
      });
    });
  }

  // ---------------------------------------------------------------------------
  // Internal Methods
  // ---------------------------------------------------------------------------

  private parse(raw: string): StateSnapshot {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceError('State file is not valid JSON', {
        filePath: this.filePath,
        error: getErrorMessage(error),
      });
    }

    const result = snapshotSchema.safeParse(json);
    if (!result.success) {
      throw new PersistenceError('State file failed validation', {
        filePath: this.filePath,
        issues: result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`),
      });
    }

    return result.data;
  }

  private async write(snapshot: StateSnapshot): Promise<void> {
    const document: StateSnapshot = {
      ...snapshot,
      devices: snapshot.devices.map(d => ({ ...d, state: collapseState(d.state) })),
    };
    const tempPath = `${this.filePath}.${process.pid}.tmp`;

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
      await fs.rename(tempPath, this.filePath);
      logger.debug('State saved', { filePath: this.filePath, devices: document.devices.length });
    } catch (error) {
      throw new PersistenceError('Failed to write state file', {
        filePath: this.filePath,
        error: getErrorMessage(error),
      });
    }
  }

  /**
   * Writes run one at a time in call order; a failed write does not block later ones.
   */
  private enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.writeChain.then(task);
    this.writeChain = run.catch((error: unknown) => {
      logger.warn('State write failed', { error: getErrorMessage(error) });
    });
    return run;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
