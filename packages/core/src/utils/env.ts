const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

export type EnvMap = Record<string, string | undefined>;

export function readBooleanEnv(env: EnvMap, name: string, defaultValue: boolean): boolean {
    const value = env[name];
    if (value === undefined) return defaultValue;
    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) return true;
    if (FALSE_VALUES.has(normalized)) return false;
    return defaultValue;
}

/** Returns undefined for unset or blank values so schema defaults apply */
export function readStringEnv(env: EnvMap, name: string): string | undefined {
    const value = env[name]?.trim();
    return value ? value : undefined;
}
