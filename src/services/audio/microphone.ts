import { spawn, ChildProcessWithoutNullStreams } from 'child_process';
import { AudioDeviceError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { IAudioCapture } from '../voice/interfaces';
import { parseCommand } from './command';

/**
 * Microphone capture through an external recorder (sox `rec` by default)
 * writing raw PCM to stdout. One process per capture.
 */
export class CommandMicrophone implements IAudioCapture {
    private process: ChildProcessWithoutNullStreams | null = null;
    private stopping = false;

    constructor(private readonly command: string) {}

    public start(onData: (chunk: Buffer) => void, onError: (error: unknown) => void): void {
        if (this.process) return;

        const { program, args } = parseCommand(this.command);
        this.stopping = false;

        const child = spawn(program, args);
        this.process = child;

        child.stdout.on('data', (chunk: Buffer) => onData(chunk));

        child.stderr.on('data', (data: Buffer) => {
            logger.debug('Recorder stderr', { output: data.toString().trim() });
        });

        child.on('error', (err) => {
            this.process = null;
            onError(new AudioDeviceError(`Could not start recorder "${program}": ${err.message}`, { program }));
        });

        child.on('exit', (code, signal) => {
            this.process = null;
            if (!this.stopping && code !== 0) {
                onError(new AudioDeviceError(`Recorder "${program}" exited unexpectedly`, { program, code, signal }));
            }
        });
    }

    public stop(): void {
        if (!this.process) return;
        this.stopping = true;
        this.process.kill();
        this.process = null;
    }
}
