// pattern: Functional Core
import AjvModule from "ajv";
import ajvErrorsModule from "ajv-errors";

// These packages are CommonJS; under Node's ESM loader the class and plugin
// live on `.default`
const Ajv = AjvModule.default;
const addErrors = ajvErrorsModule.default;

// Create singleton AJV instance configured for TypeBox schemas
const ajv = new Ajv({
  // Ignore TypeBox's custom attributes (Symbol keys)
  strict: false,
  code: { optimize: true },
  allowUnionTypes: true,
  // Required for ajv-errors
  allErrors: true,
});

// Custom `errorMessage` keywords
addErrors(ajv);

export { ajv };
