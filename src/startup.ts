import { loadSettings, SettingsError, type Settings } from "../libs/config/settings";

export type ExitFn = (code: number) => never;

/** Invalid settings are fatal: the message goes to stderr and the process exits with 1. */
export function loadSettingsOrExit(env: NodeJS.ProcessEnv = process.env, exit: ExitFn = code => process.exit(code)): Settings {
    try {
        return loadSettings(env);
    } catch (err) {
        if (err instanceof SettingsError) {
            console.error(err.message);
            return exit(1);
        }
        throw err;
    }
}
