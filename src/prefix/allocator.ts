/**
 * Prefix Allocation
 *
 * Short, unique names for ontologies so their classes can share one namespace.
 */

/**
 * The prefixes handed out during one conversion run.
 * Allocation is monotonic: a prefix, once returned, is never returned again.
 */
export class PrefixRegistry {
    private readonly allocated = new Set<string>();

    /**
     * Returns `candidate` if it is still free, else the first free
     * `candidate0`, `candidate1`, ... The result is registered.
     */
    allocate(candidate: string): string {
        let prefix = candidate;
        let counter = 0;
        while (this.allocated.has(prefix)) {
            prefix = `${candidate}${counter}`;
            counter++;
        }
        this.allocated.add(prefix);
        return prefix;
    }

    /**
     * Derives a candidate from an ontology location or name and allocates it.
     */
    derive(identifier: string): string {
        return this.allocate(derivePrefixCandidate(identifier));
    }

    has(prefix: string): boolean {
        return this.allocated.has(prefix);
    }

    values(): string[] {
        return Array.from(this.allocated);
    }
}

/**
 * Text between the last `/` and the last `.` of `identifier`.
 *
 * Without a dot the last character is dropped (`UIO` -> `UI`); a dot before
 * the last `/` leaves nothing.
 */
function shortName(identifier: string): string {
    return identifier.slice(identifier.lastIndexOf('/') + 1, identifier.lastIndexOf('.'));
}

function initials(parts: string[]): string {
    return parts.map(part => part.charAt(0)).join('').toLowerCase();
}

/**
 * Turns an identifier into a prefix candidate.
 *
 * Rules, applied to the cleaned short name:
 * - Hyphenated -> first letter of each hyphen part (`My-Cool-Onto` -> `mco`)
 * - Underscored -> first letter of each underscore part
 * - At most 3 capitals -> the capitals (`GUM.owl` -> `gum`, `pizza.owl` -> ``)
 * - Otherwise -> the first 3 characters
 */
export function derivePrefixCandidate(identifier: string): string {
    let name = shortName(identifier).replace(/[^a-zA-Z_-]/g, '');
    if (name.startsWith('-')) {
        name = name.slice(1);
    }
    if (name.endsWith('-')) {
        name = name.slice(0, -1);
    }
    // Non-overlapping: a run of n hyphens becomes ceil(n/2)
    name = name.split('--').join('-');

    if (name.includes('-')) {
        return initials(name.split('-'));
    }
    if (name.includes('_')) {
        return initials(name.split('_'));
    }
    const uppercases = name.replace(/[^A-Z]/g, '');
    if (uppercases.length <= 3) {
        return uppercases.toLowerCase();
    }
    return name.slice(0, 3).toLowerCase();
}
