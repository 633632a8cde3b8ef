export const EXECUTION_ENGINE = Symbol('EXECUTION_ENGINE');
export const GRAPHQL_SCHEMA = Symbol('GRAPHQL_SCHEMA');
