import _ from "lodash";


export interface RegistryOptions {

	/**
	 * Label prefixed to diagnostic messages.
	 * @default "bag" for {@link Bag}, "bagOnce" for {@link BagOnce}
	 */
	name: string,

	/**
	 * Log registry activity (additions, removals, calls) to the console.
	 * @default false
	 */
	verbose: boolean,
}


export function getFullOptions(defaultName: string, options: Partial<RegistryOptions> | undefined): RegistryOptions {
	return {
		name: defaultName,
		verbose: false,
		..._.omitBy(options, _.isUndefined),
	};
}
