import { describe, it, expect, vi, afterEach } from 'vitest';
import { PassThrough, Readable } from 'stream';
import { consumeLines } from '../../../src/lib/input/line-reader.js';
import { Reservoir } from '../../../src/lib/reservoir/reservoir.js';
import { TerminationCoordinator } from '../../../src/lib/termination/coordinator.js';
import type { AppendableSink } from '../../../src/lib/emitter/types.js';
import { ScriptedRandom } from '../../helpers/streams.js';

class RecordingSink implements AppendableSink {
  readonly chunks: string[] = [];

  async write(chunk: string): Promise<void> {
    this.chunks.push(chunk);
  }

  async close(): Promise<void> {}
}

class FailingSink implements AppendableSink {
  writes = 0;

  async write(): Promise<void> {
    this.writes++;
    throw new Error('disk full');
  }

  async close(): Promise<void> {}
}

describe('consumeLines', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should admit every line and stop as exhausted at end of input', async () => {
    const reservoir = new Reservoir({ capacity: 10, random: new ScriptedRandom([0.99]) });
    const coordinator = new TerminationCoordinator();

    const admitted = await consumeLines({
      input: Readable.from(['alpha\nbeta\r\ngamma']),
      reservoir,
      coordinator,
    });

    expect(admitted).toBe(3);
    expect(coordinator.reason).toBe('exhausted');
    expect(reservoir.snapshot().entries.map((entry) => entry.content)).toEqual([
      'alpha',
      'beta',
      'gamma',
    ]);
  });

  it('should tee each line to the sink with a newline', async () => {
    const sink = new RecordingSink();

    await consumeLines({
      input: Readable.from(['one\ntwo\n']),
      reservoir: new Reservoir({ capacity: 1, random: new ScriptedRandom([0.99]) }),
      coordinator: new TerminationCoordinator(),
      sink,
    });

    expect(sink.chunks).toEqual(['one\n', 'two\n']);
  });

  it('should keep empty lines as records', async () => {
    const reservoir = new Reservoir({ capacity: 5, random: new ScriptedRandom([0.99]) });

    await consumeLines({
      input: Readable.from(['a\n\nb\n']),
      reservoir,
      coordinator: new TerminationCoordinator(),
    });

    expect(reservoir.snapshot().entries).toEqual([
      { content: 'a', sequenceIndex: 0 },
      { content: '', sequenceIndex: 1 },
      { content: 'b', sequenceIndex: 2 },
    ]);
  });

  it('should stop reading after an interrupt without draining the input', async () => {
    const input = new PassThrough();
    const reservoir = new Reservoir({ capacity: 10, random: new ScriptedRandom([0.99]) });
    const coordinator = new TerminationCoordinator();

    const producer = consumeLines({ input, reservoir, coordinator });

    input.write('one\ntwo\n');
    await vi.waitFor(() => expect(reservoir.seenCount()).toBe(2));

    coordinator.stop('interrupted');
    input.write('three\n');
    input.end();

    await expect(producer).resolves.toBe(2);
    expect(coordinator.reason).toBe('interrupted');
    expect(reservoir.snapshot().entries).toEqual([
      { content: 'one', sequenceIndex: 0 },
      { content: 'two', sequenceIndex: 1 },
    ]);
  });

  it('should treat a read fault as end of input', async () => {
    const input = new PassThrough();
    const reservoir = new Reservoir({ capacity: 10, random: new ScriptedRandom([0.99]) });
    const coordinator = new TerminationCoordinator();

    const producer = consumeLines({ input, reservoir, coordinator });

    input.write('only\n');
    await vi.waitFor(() => expect(reservoir.seenCount()).toBe(1));
    input.destroy(new Error('disk went away'));

    await expect(producer).resolves.toBe(1);
    expect(coordinator.reason).toBe('exhausted');
  });

  it('should keep sampling after a sink write fails', async () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const sink = new FailingSink();
    const reservoir = new Reservoir({ capacity: 10, random: new ScriptedRandom([0.99]) });
    const coordinator = new TerminationCoordinator();

    const admitted = await consumeLines({
      input: Readable.from(['one\ntwo\n']),
      reservoir,
      coordinator,
      sink,
    });

    expect(admitted).toBe(2);
    expect(sink.writes).toBe(1);
    expect(coordinator.reason).toBe('exhausted');
    expect(reservoir.snapshot().entries.map((entry) => entry.content)).toEqual(['one', 'two']);
    expect(stderr).toHaveBeenCalledWith(
      '[linesample] WARN: Sink write failed; no longer copying input ' +
        '{"code":"FILE_IO_ERROR","error":"disk full","admitted":0}\n',
    );
    expect(stderr).not.toHaveBeenCalledWith(expect.stringContaining('INPUT_READ_ERROR'));
  });
});
