// driver/simulated.ts - Deterministic in-memory board stack
//
// Stands in for the hardware binding on machines without boards attached.
// Readings drift slowly around a per-channel base so streams look alive,
// but the sequence is fully determined by the number of reads.

import {
  DriverError,
  DEFAULT_CALIBRATION_OFFSET,
  DEFAULT_CALIBRATION_SLOPE,
  DEFAULT_UPDATE_INTERVAL,
  MAX_BOARDS,
  MAX_UPDATE_INTERVAL,
  MIN_UPDATE_INTERVAL,
  NUM_CHANNELS,
  OPEN_TC_VALUE,
  type BoardAddress,
  type BoardDescriptor,
  type Calibration,
  type ChannelIndex,
  type ThermocoupleType,
} from '@thermofuse/contracts';
import { fail, ok, type BoardDriver, type DriverResult } from './types';

// Approximate type K sensitivity near room temperature, volts per degree
const SEEBECK_V_PER_C = 41e-6;

export interface SimulatedDriverOptions {
  /** Addresses with a board present (default: [0]) */
  addresses?: BoardAddress[];
  /** Base hot-junction temperature in degC (default: 22.5) */
  baseTemperature?: number;
  /** Cold-junction temperature in degC (default: 24.0) */
  cjcTemperature?: number;
  /** Channels with no thermocouple attached, as "address:channel" */
  openChannels?: string[];
  calibrationDate?: string;
}

interface SimulatedBoard {
  open: boolean;
  updateInterval: number;
  tcTypes: ThermocoupleType[];
  calibration: Calibration[];
  reads: number[];
}

export class SimulatedBoardDriver implements BoardDriver {
  readonly name = 'simulated';

  private readonly boards = new Map<BoardAddress, SimulatedBoard>();
  private readonly baseTemperature: number;
  private readonly cjcTemperature: number;
  private readonly openChannels: Set<string>;
  private readonly calibrationDate: string;

  constructor(options: SimulatedDriverOptions = {}) {
    for (const address of options.addresses ?? [0]) {
      this.boards.set(address, {
        open: false,
        updateInterval: DEFAULT_UPDATE_INTERVAL,
        tcTypes: Array.from({ length: NUM_CHANNELS }, (): ThermocoupleType => 'DISABLED'),
        calibration: Array.from({ length: NUM_CHANNELS }, () => ({
          slope: DEFAULT_CALIBRATION_SLOPE,
          offset: DEFAULT_CALIBRATION_OFFSET,
        })),
        reads: Array.from({ length: NUM_CHANNELS }, () => 0),
      });
    }
    this.baseTemperature = options.baseTemperature ?? 22.5;
    this.cjcTemperature = options.cjcTemperature ?? 24.0;
    this.openChannels = new Set(options.openChannels ?? []);
    this.calibrationDate = options.calibrationDate ?? '2024-01-15';
  }

  async listBoards(): Promise<DriverResult<BoardDescriptor[]>> {
    const boards = [...this.boards.keys()]
      .sort((a, b) => a - b)
      .map((address) => ({ address, id: `SIM-${address}`, name: 'Simulated thermocouple board' }));
    return ok(boards);
  }

  async open(address: BoardAddress): Promise<DriverResult<void>> {
    if (address < 0 || address >= MAX_BOARDS) {
      return fail(new DriverError('open', address, undefined, { reason: 'address out of range' }));
    }
    const board = this.boards.get(address);
    if (!board) return fail(new DriverError('open', address, undefined, { reason: 'no board detected' }));
    board.open = true;
    // Hardware comes up with every channel disabled
    board.tcTypes.fill('DISABLED');
    return ok(undefined);
  }

  async close(address: BoardAddress): Promise<DriverResult<void>> {
    const board = this.boards.get(address);
    if (!board?.open) return fail(new DriverError('close', address, undefined, { reason: 'board not open' }));
    board.open = false;
    return ok(undefined);
  }

  isOpen(address: BoardAddress): boolean {
    return this.boards.get(address)?.open ?? false;
  }

  async readSerial(address: BoardAddress): Promise<DriverResult<string>> {
    const board = this.openBoard('readSerial', address);
    if (!board.success) return board;
    return ok(`SIM${(0x1a2b00 + address).toString(16).toUpperCase()}`);
  }

  async readCalibrationDate(address: BoardAddress): Promise<DriverResult<string>> {
    const board = this.openBoard('readCalibrationDate', address);
    if (!board.success) return board;
    return ok(this.calibrationDate);
  }

  async readCalibrationCoefficients(address: BoardAddress, channel: ChannelIndex): Promise<DriverResult<Calibration>> {
    const board = this.openChannel('readCalibrationCoefficients', address, channel);
    if (!board.success) return board;
    return ok({ ...board.data.calibration[channel] });
  }

  async writeCalibrationCoefficients(
    address: BoardAddress,
    channel: ChannelIndex,
    calibration: Calibration,
  ): Promise<DriverResult<void>> {
    const board = this.openChannel('writeCalibrationCoefficients', address, channel);
    if (!board.success) return board;
    board.data.calibration[channel] = { ...calibration };
    return ok(undefined);
  }

  async readUpdateInterval(address: BoardAddress): Promise<DriverResult<number>> {
    const board = this.openBoard('readUpdateInterval', address);
    if (!board.success) return board;
    return ok(board.data.updateInterval);
  }

  async writeUpdateInterval(address: BoardAddress, seconds: number): Promise<DriverResult<void>> {
    const board = this.openBoard('writeUpdateInterval', address);
    if (!board.success) return board;
    if (!Number.isInteger(seconds) || seconds < MIN_UPDATE_INTERVAL || seconds > MAX_UPDATE_INTERVAL) {
      return fail(new DriverError('writeUpdateInterval', address, undefined, { reason: `invalid interval ${seconds}` }));
    }
    board.data.updateInterval = seconds;
    return ok(undefined);
  }

  async writeThermocoupleType(
    address: BoardAddress,
    channel: ChannelIndex,
    type: ThermocoupleType,
  ): Promise<DriverResult<void>> {
    const board = this.openChannel('writeThermocoupleType', address, channel);
    if (!board.success) return board;
    board.data.tcTypes[channel] = type;
    return ok(undefined);
  }

  async readTemperature(address: BoardAddress, channel: ChannelIndex): Promise<DriverResult<number>> {
    const board = this.openChannel('readTemperature', address, channel);
    if (!board.success) return board;
    if (board.data.tcTypes[channel] === 'DISABLED') {
      return fail(new DriverError('readTemperature', address, channel, { reason: 'channel disabled' }));
    }
    if (this.openChannels.has(`${address}:${channel}`)) return ok(OPEN_TC_VALUE);
    return ok(this.hotJunction(board.data, address, channel));
  }

  async readAdcVoltage(address: BoardAddress, channel: ChannelIndex): Promise<DriverResult<number>> {
    const board = this.openChannel('readAdcVoltage', address, channel);
    if (!board.success) return board;
    const delta = this.hotJunction(board.data, address, channel) - this.cjcTemperature;
    return ok(delta * SEEBECK_V_PER_C);
  }

  async readCjcTemperature(address: BoardAddress, channel: ChannelIndex): Promise<DriverResult<number>> {
    const board = this.openChannel('readCjcTemperature', address, channel);
    if (!board.success) return board;
    return ok(this.cjcTemperature + address * 0.1);
  }

  // ─── Internals ─────────────────────────────────────────────────────────────

  private hotJunction(board: SimulatedBoard, address: BoardAddress, channel: ChannelIndex): number {
    const n = board.reads[channel]++;
    const base = this.baseTemperature + address * 0.5 + channel * 0.25;
    return base + 0.05 * Math.sin(n / 8);
  }

  private openBoard(operation: string, address: BoardAddress): DriverResult<SimulatedBoard> {
    const board = this.boards.get(address);
    if (!board?.open) return fail(new DriverError(operation, address, undefined, { reason: 'board not open' }));
    return ok(board);
  }

  private openChannel(operation: string, address: BoardAddress, channel: ChannelIndex): DriverResult<SimulatedBoard> {
    if (!Number.isInteger(channel) || channel < 0 || channel >= NUM_CHANNELS) {
      return fail(new DriverError(operation, address, channel, { reason: 'channel out of range' }));
    }
    return this.openBoard(operation, address);
  }
}

/** Parse THERMO_SIM_BOARDS ("0,1") into a list of addresses. */
export function parseSimulatedAddresses(value: string | undefined): BoardAddress[] | undefined {
  if (!value) return undefined;
  const addresses = value
    .split(',')
    .map((part) => parseInt(part.trim(), 10))
    .filter((n) => Number.isInteger(n) && n >= 0 && n < MAX_BOARDS);
  return addresses.length > 0 ? addresses : undefined;
}

export function createSimulatedDriver(env: Record<string, string | undefined> = process.env): SimulatedBoardDriver {
  return new SimulatedBoardDriver({ addresses: parseSimulatedAddresses(env.THERMO_SIM_BOARDS) });
}

export default createSimulatedDriver;
