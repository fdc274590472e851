/**
 * Generator - API documentation output
 *
 * @module generator
 * @category Generator
 */

// OpenAPI generation
export { generateOpenAPI } from './openapi';
export type {
  OpenAPISpec,
  OpenAPIOptions,
  OperationObject,
  ParameterObject,
  PathItem,
  RefObject,
  ResponseObject,
  SchemaObject,
} from './openapi';

// Serialization
export { toYAML } from './yaml';
