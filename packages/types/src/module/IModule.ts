import type { IModuleMetadata } from './IModuleMetadata.js';

/**
 * Contract for backend feature modules.
 *
 * Modules follow a two-phase lifecycle. `init()` receives dependencies,
 * configures services and prepares storage (indexes). `run()` is called once
 * every module has finished `init()`, so a module may rely on its peers being
 * configured by then.
 *
 * @typeParam TDependencies - Shape of the dependencies object passed to init()
 */
export interface IModule<TDependencies extends object = Record<string, unknown>> {
    /**
     * Static metadata used for logging and introspection.
     */
    readonly metadata: IModuleMetadata;

    /**
     * Prepare the module with injected dependencies.
     *
     * @param dependencies - Services required by the module
     * @throws Error if initialization fails; bootstrap aborts startup
     */
    init(dependencies: TDependencies): Promise<void>;

    /**
     * Activate the module after all modules have initialized.
     */
    run(): Promise<void>;
}
