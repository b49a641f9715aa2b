/**
 * Tree-sitter queries for JavaScript structural extraction.
 *
 * FUNCTION_QUERY keeps its four forms as separate patterns so that
 * `QueryMatch.pattern` identifies the form (see FunctionPattern).
 */

export enum FunctionPattern {
    Declaration = 0,
    VariableBound = 1,
    MemberAssignment = 2,
    Method = 3,
}

export const FUNCTION_QUERY = `
(function_declaration
  name: (identifier) @function.name) @function.definition

(variable_declarator
  name: (identifier) @function.name
  value: [(function_expression) (arrow_function)] @function.value) @function.definition

(expression_statement
  (assignment_expression
    left: (member_expression
      property: (property_identifier) @function.name)
    right: [(function_expression) (arrow_function)] @function.value)) @function.definition

(method_definition
  name: (property_identifier) @function.name) @function.definition
`;

export const CALL_QUERY = `
(call_expression
  function: [
    (identifier) @call.target
    (member_expression
      property: (property_identifier) @call.target.member) @call.target.expression
    (super) @call.target
  ]
  arguments: (arguments) @call.arguments) @call.expression
`;

export const REQUIRE_QUERY = `
(call_expression
  function: (identifier) @require.func
  arguments: (arguments (string) @require.path)
  (#eq? @require.func "require")) @require.call
`;

export const VARIABLE_QUERY = `
[
  (lexical_declaration
    (variable_declarator
      name: (identifier) @variable.name) @variable.declarator)
  (variable_declaration
    (variable_declarator
      name: (identifier) @variable.name) @variable.declarator)
] @variable.declaration
`;
