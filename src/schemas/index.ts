// Input schemas
export { CliArgsSchema, SearchRulesInputSchema } from './inputs.js';

// Output schemas
export { SearchRulesOutputSchema } from './outputs.js';
