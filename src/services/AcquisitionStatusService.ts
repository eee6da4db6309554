// src/services/AcquisitionStatusService.ts
import { Server as SocketIOServer } from 'socket.io';
import {
  Reading,
  ReadingPayload,
  SessionState,
  toReadingPayload,
} from '../types/telemetry';

export interface AcquisitionSnapshot {
  status: 'ok';
  session: SessionState;
  recordsWritten: number;
  failedReadings: number;
  lastReading: ReadingPayload | null;
  startedAt: string;
}

/**
 * In-memory view of the running acquisition for the status API.
 * Fed by the lifecycle controller after each durable append; emits the
 * reading over Socket.IO when live emission is enabled.
 */
class AcquisitionStatusService {
  private io?: SocketIOServer;
  private liveEmitEnabled = true;
  private session: SessionState = 'disconnected';
  private recordsWritten = 0;
  private failedReadings = 0;
  private lastReading: Reading | null = null;
  private startedAt = new Date();

  /** Attaches the Socket.IO server used for 'reading' events. */
  init(io: SocketIOServer): void {
    this.io = io;
  }

  isLiveEmitEnabled(): boolean {
    return this.liveEmitEnabled;
  }

  setLiveEmitEnabled(enabled: boolean): void {
    this.liveEmitEnabled = enabled;
  }

  setSessionState(state: SessionState): void {
    this.session = state;
  }

  onReading(reading: Reading): void {
    this.recordsWritten += 1;
    if (reading.status.kind === 'failed') this.failedReadings += 1;
    this.lastReading = reading;
    if (this.io && this.liveEmitEnabled) {
      this.io.emit('reading', toReadingPayload(reading));
    }
  }

  getLatest(): ReadingPayload | null {
    return this.lastReading ? toReadingPayload(this.lastReading) : null;
  }

  snapshot(): AcquisitionSnapshot {
    return {
      status: 'ok',
      session: this.session,
      recordsWritten: this.recordsWritten,
      failedReadings: this.failedReadings,
      lastReading: this.getLatest(),
      startedAt: this.startedAt.toISOString(),
    };
  }

  /** Clears counters and detaches Socket.IO (tests, restart). */
  reset(): void {
    this.io = undefined;
    this.liveEmitEnabled = true;
    this.session = 'disconnected';
    this.recordsWritten = 0;
    this.failedReadings = 0;
    this.lastReading = null;
    this.startedAt = new Date();
  }
}

export const AcquisitionStatus = new AcquisitionStatusService();
