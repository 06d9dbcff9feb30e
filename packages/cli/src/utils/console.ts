/**
 * Formatted console output helpers
 */

let verboseEnabled = false;

export function setVerbose(enabled: boolean): void {
    verboseEnabled = enabled;
}

export function log(message: string): void {
    console.log(message);
}

export function success(message: string): void {
    console.log(`✓ ${message}`);
}

export function warn(message: string): void {
    console.warn(`⚠️  ${message}`);
}

export function info(message: string): void {
    console.info(`ℹ ${message}`);
}

export function arrow(message: string): void {
    console.log(`→ ${message}`);
}

/**
 * Only printed with --verbose.
 */
export function debug(message: string): void {
    if (verboseEnabled) {
        console.log(`· ${message}`);
    }
}

/**
 * Reports an error and exits with status 1.
 */
export function fail(message: string): never {
    console.error(`\n✖ Error: ${message}`);
    process.exit(1);
}
