import { describe, expect, it } from 'vitest';
import { REGISTERS } from '../src/constants/constants.js';
import { PipelineEngine } from '../src/emulator/pipeline-engine.js';
import { RegisterFile } from '../src/emulator/register-file.js';
import { buildReadCommand, buildWriteCommand } from '../src/utils/parity.js';
import { createFakeLogger } from './helpers.js';

const READ_DEVID = buildReadCommand(REGISTERS.DEVID); // 0x2002

describe('PipelineEngine', () => {
  it('answers the first frame with (0, 0)', () => {
    const engine = new PipelineEngine();
    expect(engine.process(READ_DEVID)).toBe(0x0000);
  });

  it('returns a read result one frame late', () => {
    const engine = new PipelineEngine();
    engine.process(READ_DEVID);
    expect(engine.process(0x0000)).toBe(0x216a);
  });

  it('does not check command parity', () => {
    const engine = new PipelineEngine();
    engine.process(0x2000);
    expect(engine.process(0x0000)).toBe(0x216a);
  });

  it('echoes the stored value after a write', () => {
    const engine = new PipelineEngine();
    expect(engine.process(buildWriteCommand(REGISTERS.CTRL1, 0x0f))).toBe(0x0000);
    expect(engine.pendingResponse).toEqual({ addr: 0, data: 0x0f });
    // READ CTRL1: response carries the write result (0x0, 0x0F)
    expect(engine.process(buildReadCommand(REGISTERS.CTRL1))).toBe(0x003c);
    expect(engine.process(buildReadCommand(REGISTERS.CTRL1))).toBe(0x003c);
  });

  it('reports DEVID unchanged after a write to it', () => {
    const engine = new PipelineEngine(new RegisterFile(createFakeLogger()));
    engine.process(buildWriteCommand(REGISTERS.DEVID, 0x12));
    expect(engine.pendingResponse).toEqual({ addr: 8, data: 0x5a });
    expect(engine.process(0x0000)).toBe(0x216a);
  });

  it('reports 0 for a write to an unmapped address', () => {
    const engine = new PipelineEngine();
    engine.process(buildWriteCommand(0x9, 0xaa));
    expect(engine.process(0x0000)).toBe(0x2400);
  });

  it('clears the pending response on an unknown command', () => {
    const logger = createFakeLogger();
    const engine = new PipelineEngine(new RegisterFile(), logger);
    engine.process(READ_DEVID);
    expect(engine.process(0xc402)).toBe(0x216a);
    expect(engine.process(0x0000)).toBe(0x0000);
    expect(logger.warn).toHaveBeenCalledWith('Unknown CMD=0x3', { frame: '0xC402' });
  });

  it('treats CMD=2 as unknown too', () => {
    const engine = new PipelineEngine(new RegisterFile(), createFakeLogger());
    engine.process(buildWriteCommand(REGISTERS.CTRL2, 0x33));
    engine.process(0x8000);
    expect(engine.pendingResponse).toEqual({ addr: 0, data: 0 });
    expect(engine.registers.read(REGISTERS.CTRL2)).toBe(0x33);
  });

  it('logs every tenth watchdog write', () => {
    const logger = createFakeLogger();
    const engine = new PipelineEngine(new RegisterFile(), logger);

    for (let i = 0; i < 9; i++) {
      engine.process(buildWriteCommand(REGISTERS.WDG, i & 1));
    }
    expect(logger.info).not.toHaveBeenCalled();

    engine.process(buildWriteCommand(REGISTERS.WDG, 1));
    expect(engine.watchdogServiceCount).toBe(10);
    expect(logger.info).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith('Watchdog serviced 10 times', { watchdogCount: 10 });
  });

  it('does not count watchdog reads or writes to other registers', () => {
    const engine = new PipelineEngine();
    engine.process(buildReadCommand(REGISTERS.WDG));
    engine.process(buildWriteCommand(REGISTERS.ICR, 1));
    engine.process(buildWriteCommand(REGISTERS.WDG, 1));
    expect(engine.watchdogServiceCount).toBe(1);
  });

  it('keeps separate instances independent', () => {
    const a = new PipelineEngine();
    const b = new PipelineEngine();
    a.process(buildWriteCommand(REGISTERS.CFG, 0x77));
    a.process(READ_DEVID);
    expect(b.process(0x0000)).toBe(0x0000);
    expect(b.registers.read(REGISTERS.CFG)).toBe(0);
  });
});
