import { spawn, ChildProcess, SpawnOptions } from 'child_process';

/**
 * Starts and stops package-manager processes
 */
export interface IProcessExecutor {
    spawn(command: string, args: string[], options: SpawnOptions): ChildProcess;
    /** Stops a running process; onError fires if the tree kill could not start */
    terminate(child: ChildProcess, onError?: (error: Error) => void): void;
}

/**
 * Default implementation using Node.js child_process
 */
export class NodeProcessExecutor implements IProcessExecutor {
    spawn(command: string, args: string[], options: SpawnOptions): ChildProcess {
        return spawn(command, args, options);
    }

    /**
     * On Windows kills the whole tree, since cmd.exe and PowerShell wrappers leave children behind
     */
    terminate(child: ChildProcess, onError?: (error: Error) => void): void {
        if (process.platform !== 'win32' || child.pid === undefined) {
            child.kill();
            return;
        }
        const killer = spawn('taskkill', ['/pid', String(child.pid), '/T', '/F'], { stdio: 'ignore', windowsHide: true });
        killer.on('error', (error: Error) => {
            onError?.(error);
            child.kill();
        });
    }
}
