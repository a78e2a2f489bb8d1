import { describe, expect, it } from 'vitest';
import { EXIT_KILLED, EXIT_LAUNCH_FAILED, runProcess } from '../src/services/sandbox/process-runner';

const node = (script: string) => ({ command: process.execPath, args: ['-e', script] });

describe('runProcess', () => {
    it('captures stdout of a successful process', async () => {
        const result = await runProcess(node('process.stdout.write(String(3 * 5))'));

        expect(result).toEqual({ stdout: '15', stderr: '', exitCode: 0, timedOut: false });
    });

    it('reports a non-zero exit code with its stderr', async () => {
        const result = await runProcess(node("process.stderr.write('bad input'); process.exit(3)"));

        expect(result.exitCode).toBe(3);
        expect(result.stderr).toBe('bad input');
    });

    it('resolves with 127 when the command cannot be launched', async () => {
        const result = await runProcess({ command: '/nonexistent/definitely-missing-binary', args: [] });

        expect(result.exitCode).toBe(EXIT_LAUNCH_FAILED);
        expect(result.stderr).toContain('ENOENT');
        expect(result.timedOut).toBe(false);
    });

    it('kills a process that outlives its timeout', async () => {
        const result = await runProcess({ ...node('setTimeout(() => {}, 10000)'), timeoutMs: 200 });

        expect(result.exitCode).toBe(EXIT_KILLED);
        expect(result.timedOut).toBe(true);
        expect(result.stderr).toBe('\n[process killed: timed out after 200ms]');
    });

    it('kills a process when the caller aborts', async () => {
        const controller = new AbortController();
        setTimeout(() => controller.abort(), 50);

        const result = await runProcess({ ...node('setTimeout(() => {}, 10000)'), signal: controller.signal });

        expect(result.exitCode).toBe(EXIT_KILLED);
        expect(result.timedOut).toBe(false);
        expect(result.stderr).toBe('\n[process killed: aborted]');
    });

    it('caps captured output', async () => {
        const result = await runProcess({ ...node("process.stdout.write('x'.repeat(50))"), maxOutputBytes: 10 });

        expect(result.stdout).toBe('xxxxxxxxxx\n[output truncated after 10 bytes]');
        expect(result.exitCode).toBe(0);
    });

    it('maps termination by signal to 128 + signal number', async () => {
        const result = await runProcess(node("process.kill(process.pid, 'SIGTERM')"));

        expect(result.exitCode).toBe(143);
    });

    it('passes only the given environment', async () => {
        const result = await runProcess({
            ...node("process.stdout.write(Object.keys(process.env).join(','))"),
            env: { HARNESS_ONLY: 'yes' },
        });

        expect(result.stdout).toBe('HARNESS_ONLY');
    });
});
