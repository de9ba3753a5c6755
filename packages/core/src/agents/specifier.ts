/**
 * Specifiers: the dotted, time-ordered identifiers this tool shows for agents.
 *
 * Managed agents use `ddd.dddd.ddd`, taken from the clock when the agent is
 * started and read back from the directory name afterwards. Foreign agents use
 * `ddd.dddd.xxx`, so the two namespaces can never collide.
 */

export const SENTINEL_SPECIFIER = '000.0000.000';

export const FOREIGN_SPECIFIER_SUFFIX = 'xxx';

export const MANAGED_DIRECTORY_PREFIX = 'ssh-agent-';

const SPECIFIER_PATTERN = /\d{3}\.\d{4}\.\d{3}/;

const MANAGED_DIRECTORY_PATTERN = /^ssh-agent-\d{3}\.\d{4}\.\d{3}$/;

// 7 integer digits and 3 fractional digits of an epoch-seconds string
const CLOCK_DIGITS_PATTERN = /(\d{3})(\d{4})\.(\d{3})/;

function clockGroups(epochMs: number): [string, string, string] | null {
    const match = (epochMs / 1000).toFixed(3).match(CLOCK_DIGITS_PATTERN);
    return match ? [match[1], match[2], match[3]] : null;
}

/**
 * Allocate the specifier for a new managed agent from the clock.
 *
 * @example
 * ```typescript
 * allocateSpecifier(1712345678123) // "234.5678.123"
 * ```
 */
export function allocateSpecifier(epochMs: number): string {
    const groups = clockGroups(epochMs);
    return groups ? groups.join('.') : SENTINEL_SPECIFIER;
}

/**
 * Read the specifier back out of a managed directory name.
 * The directory name is authoritative; no match yields the sentinel.
 */
export function parseSpecifier(directoryName: string): string {
    const match = directoryName.match(SPECIFIER_PATTERN);
    return match ? match[0] : SENTINEL_SPECIFIER;
}

/**
 * Specifier for an agent known only from the environment.
 *
 * Uses the earliest of the given timestamps; callers pass null for a
 * timestamp whose pid or socket is not valid.
 */
export function foreignSpecifier(timestamps: ReadonlyArray<Date | null>): string {
    const known = timestamps
        .filter((t): t is Date => t !== null)
        .map(t => t.getTime());

    const groups = known.length > 0 ? clockGroups(Math.min(...known)) : null;
    const [first, second] = groups ?? SENTINEL_SPECIFIER.split('.');
    return `${first}.${second}.${FOREIGN_SPECIFIER_SUFFIX}`;
}

export function isForeignSpecifier(specifier: string): boolean {
    return specifier.endsWith(`.${FOREIGN_SPECIFIER_SUFFIX}`);
}

export function managedDirectoryName(specifier: string): string {
    return `${MANAGED_DIRECTORY_PREFIX}${specifier}`;
}

export function isManagedDirectoryName(name: string): boolean {
    return MANAGED_DIRECTORY_PATTERN.test(name);
}
