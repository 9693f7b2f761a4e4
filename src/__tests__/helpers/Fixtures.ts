import type { IEntropySource, ILogger } from '../../Platform/Ports.js';

/** Hands out 1, 2, 3, ... as consecutive bytes. */
export class CountingEntropySource implements IEntropySource {
    private next = 1;

    public generateBytes(count: number): Uint8Array {
        const out = new Uint8Array(count);
        for (let i = 0; i < count; i++) out[i] = this.next++ & 0xff;
        return out;
    }
}

export class RecordingLogger implements ILogger {
    public readonly lines: string[] = [];

    public debug(component: string, message: string): void {
        this.lines.push(`debug ${component}: ${message}`);
    }

    public info(component: string, message: string): void {
        this.lines.push(`info ${component}: ${message}`);
    }

    public warn(component: string, message: string): void {
        this.lines.push(`warn ${component}: ${message}`);
    }
}
