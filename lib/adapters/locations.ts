import * as path from 'path';
import { PackageManagerName } from '../models';

/**
 * Directories a package manager's executable usually lands in when its
 * installer did not put it on PATH, most likely first
 */
export function knownInstallDirectories(name: PackageManagerName, env: NodeJS.ProcessEnv = process.env): string[] {
    const userProfile = env.USERPROFILE ?? 'C:\\Users\\Default';
    const programData = env.ProgramData ?? 'C:\\ProgramData';
    const programFiles = env.ProgramFiles ?? 'C:\\Program Files';
    const localAppData = env.LOCALAPPDATA ?? path.win32.join(userProfile, 'AppData', 'Local');

    switch (name) {
        case 'winget':
            return [path.win32.join(localAppData, 'Microsoft', 'WindowsApps')];
        case 'chocolatey':
            return [path.win32.join(env.ChocolateyInstall ?? path.win32.join(programData, 'chocolatey'), 'bin')];
        case 'scoop':
            return [path.win32.join(env.SCOOP ?? path.win32.join(userProfile, 'scoop'), 'shims')];
        case 'npm':
            return [path.win32.join(programFiles, 'nodejs')];
        case 'pip':
            return [
                path.win32.join(localAppData, 'Programs', 'Python', 'Python312', 'Scripts'),
                path.win32.join(programFiles, 'Python312', 'Scripts'),
            ];
        case 'conda':
            return condaInstallDirectories(userProfile, programData, localAppData);
    }
}

function condaInstallDirectories(userProfile: string, programData: string, localAppData: string): string[] {
    const roots = [
        path.win32.join(userProfile, 'miniconda3'),
        path.win32.join(userProfile, 'anaconda3'),
        path.win32.join(localAppData, 'miniconda3'),
        path.win32.join(localAppData, 'anaconda3'),
        path.win32.join(programData, 'miniconda3'),
        path.win32.join(programData, 'anaconda3'),
        'C:\\tools\\miniconda3',
        'C:\\tools\\anaconda3',
    ];
    return roots.flatMap(root => [path.win32.join(root, 'Scripts'), path.win32.join(root, 'condabin')]);
}
