/**
 * Descriptive metadata every module exposes.
 */
export interface IModuleMetadata {
    /** Stable identifier, used as the `module` binding on child loggers */
    id: string;

    /** Human-readable name */
    name: string;

    /** Semantic version of the module */
    version: string;

    /** Short description of what the module provides */
    description?: string;
}
