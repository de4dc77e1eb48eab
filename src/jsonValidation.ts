import Ajv, { type JSONSchemaType } from "ajv";
import addFormats from "ajv-formats";
import { ConfigError } from "./errors";

const ajv = new Ajv({ allErrors: true });
addFormats(ajv);

/**
 * Compile a schema into a function that returns the validated value or
 * throws a {@link ConfigError} listing every violation.
 */
export function createValidator<T>(schema: JSONSchemaType<T>, what: string): (value: unknown) => T {
	const validate = ajv.compile(schema);
	return (value) => {
		if (validate(value)) {
			return value;
		}
		throw new ConfigError(`Invalid ${what}: ${ajv.errorsText(validate.errors, { dataVar: what })}`);
	};
}

export function parseJson(text: string, what: string): unknown {
	try {
		const value: unknown = JSON.parse(text);
		return value;
	} catch (error) {
		throw new ConfigError(`Invalid ${what}: ${error instanceof Error ? error.message : String(error)}`);
	}
}
