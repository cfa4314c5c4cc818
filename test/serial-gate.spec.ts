import { describe, it, expect } from 'vitest';
import { SerialGate } from '../src/serial-gate';

const tick = () => new Promise((resolve) => setTimeout(resolve, 0));

describe('SerialGate', () => {
  it('should run tasks in submission order without overlap', async () => {
    const gate = new SerialGate();
    const events: string[] = [];
    const task = (name: string, delay: number) => async () => {
      events.push(`${name}:start`);
      await new Promise((resolve) => setTimeout(resolve, delay));
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([
      gate.run(task('a', 20)),
      gate.run(task('b', 0)),
      gate.run(task('c', 5)),
    ]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  it('should keep going after a task rejects', async () => {
    const gate = new SerialGate();

    const failed = gate.run(async () => {
      throw new Error('boom');
    });
    const next = gate.run(async () => 'next');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('next');
  });

  it('should count queued and running tasks', async () => {
    const gate = new SerialGate();

    const first = gate.run(async () => undefined);
    const second = gate.run(async () => undefined);
    expect(gate.size).toBe(2);

    await Promise.all([first, second]);
    await tick();
    expect(gate.size).toBe(0);
  });
});
