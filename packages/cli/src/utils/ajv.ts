// pattern: Functional Core
import AjvModule from "ajv";
import ajvErrorsModule from "ajv-errors";

// Both packages are CommonJS; under NodeNext the class lives on `.default`
const Ajv = AjvModule.default;
const addErrors = ajvErrorsModule.default;

// Create singleton AJV instance configured for TypeBox schemas
const ajv = new Ajv({
  // Ignore TypeBox's custom attributes (Symbol keys)
  strict: false,
  // Enable schema compilation caching
  code: { optimize: true },
  // Allow custom keywords
  allowUnionTypes: true,
  // Required for ajv-errors
  allErrors: true,
});

// Add enhanced error messages
addErrors(ajv);

export { ajv };
