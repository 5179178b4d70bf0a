import { DEFAULT_SCHEMA, load, Type, types, YAMLException } from "js-yaml";

export class YamlSyntaxError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "YamlSyntaxError";
    }
}

const ZERO_PADDED_DIGITS = /^[-+]?0[0-9_]+$/;

function withoutZeroPaddedDigits(base: Type): Type {
    return new Type(base.tag, {
        kind: "scalar",
        resolve: (data: unknown) =>
            !(typeof data === "string" && ZERO_PADDED_DIGITS.test(data)) &&
            base.resolve(data),
        construct: (data: unknown) => base.construct(data),
    });
}

// Account ids such as 012345678901 keep their leading zero: zero-padded
// digits resolve to strings instead of decimal numbers.
const YAML_SCHEMA = DEFAULT_SCHEMA.extend({
    implicit: [
        withoutZeroPaddedDigits(types.int),
        withoutZeroPaddedDigits(types.float),
    ],
});

/**
 * Loads a single YAML document. Syntax errors, including duplicate keys, are
 * rethrown as {@link YamlSyntaxError}; an empty document yields `undefined`.
 */
export function loadYaml(content: string): unknown {
    try {
        return load(content, { schema: YAML_SCHEMA });
    } catch (error) {
        if (error instanceof YAMLException) {
            throw new YamlSyntaxError(error.message);
        }
        throw error;
    }
}
