import { spawn } from 'child_process';
import { AudioDeviceError } from '../../utils/errors';
import { IAudioPlayer } from '../voice/interfaces';
import { parseCommand } from './command';

/**
 * Plays a complete audio clip by piping it to an external player
 * (sox `play` by default). Resolves once playback has finished.
 */
export class CommandAudioPlayer implements IAudioPlayer {
    constructor(private readonly command: string) {}

    public play(audio: Buffer): Promise<void> {
        const { program, args } = parseCommand(this.command);

        return new Promise((resolve, reject) => {
            const child = spawn(program, args, { stdio: ['pipe', 'ignore', 'pipe'] });
            let stderr = '';
            let failed = false;

            const fail = (error: AudioDeviceError) => {
                if (failed) return;
                failed = true;
                reject(error);
            };

            child.stderr.on('data', (data: Buffer) => {
                stderr += data.toString();
            });

            child.on('error', (err) => {
                fail(new AudioDeviceError(`Could not start player "${program}": ${err.message}`, { program }));
            });

            child.stdin.on('error', (err) => {
                fail(new AudioDeviceError(`Player "${program}" closed its input: ${err.message}`, { program }));
            });

            child.on('close', (code) => {
                if (code === 0) {
                    if (!failed) resolve();
                    return;
                }
                fail(new AudioDeviceError(`Player "${program}" exited with code ${code}`, { program, code, stderr: stderr.trim() }));
            });

            child.stdin.end(audio);
        });
    }
}
