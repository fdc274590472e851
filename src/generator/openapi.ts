/**
 * OpenAPI Generator - Generate an OpenAPI 3.0 document for the post API
 *
 * Builds the document from the post field declarations, so the
 * documented payload matches what the validator enforces.
 *
 * @module generator/openapi
 * @category Generator
 */

import { FILTER_PARAMS } from '../query/filter';
import { MAX_POST_ID, postFields, POST_INPUT_FIELDS, type FieldDefinition } from '../schema/post';

/**
 * OpenAPI 3.0 Specification type.
 */
export interface OpenAPISpec {
  openapi: '3.0.0';
  info: {
    title: string;
    version: string;
    description?: string;
  };
  servers?: Array<{ url: string; description?: string }>;
  paths: Record<string, PathItem>;
  components: {
    schemas: Record<string, SchemaObject>;
    responses: Record<string, ResponseObject>;
  };
  tags: Array<{ name: string; description?: string }>;
}

/**
 * OpenAPI Path Item.
 */
export interface PathItem {
  get?: OperationObject;
  post?: OperationObject;
  delete?: OperationObject;
  parameters?: ParameterObject[];
}

/**
 * OpenAPI Operation.
 */
export interface OperationObject {
  tags?: string[];
  summary?: string;
  operationId?: string;
  parameters?: ParameterObject[];
  requestBody?: {
    required?: boolean;
    content: Record<string, { schema: SchemaObject | RefObject }>;
  };
  responses: Record<string, ResponseObject | RefObject>;
}

/**
 * OpenAPI Schema Object.
 */
export interface SchemaObject {
  type?: string;
  description?: string;
  properties?: Record<string, SchemaObject | RefObject>;
  required?: string[];
  items?: SchemaObject | RefObject;
  readOnly?: boolean;
  minimum?: number;
  maximum?: number;
  minLength?: number;
}

/**
 * OpenAPI Reference Object.
 */
export interface RefObject {
  $ref: string;
}

/**
 * OpenAPI Parameter Object.
 */
export interface ParameterObject {
  name: string;
  in: 'query' | 'header' | 'path' | 'cookie';
  required?: boolean;
  schema: SchemaObject;
  description?: string;
}

/**
 * OpenAPI Response Object.
 */
export interface ResponseObject {
  description: string;
  headers?: Record<string, { description?: string; schema: SchemaObject }>;
  content?: Record<string, { schema: SchemaObject | RefObject }>;
}

/**
 * Options for OpenAPI generation.
 */
export interface OpenAPIOptions {
  /** API title */
  title?: string;
  /** API version */
  version?: string;
  /** API description */
  description?: string;
  /** Server URL */
  serverUrl?: string;
  /** Path prefix of every route (default: '') */
  basePath?: string;
}

const JSON_CONTENT = 'application/json';

/** Shared error responses, by status code. */
const ERROR_RESPONSES: Record<string, string> = {
  '404': 'Post not found',
  '406': 'Client does not accept application/json',
  '415': 'Request body is not application/json',
  '422': 'Request body is not a valid post',
};

/**
 * Generate the OpenAPI 3.0 document of the post API.
 *
 * @example
 * ```typescript
 * import { generateOpenAPI } from 'posts-api';
 *
 * const spec = generateOpenAPI({
 *   version: '1.0.0',
 *   serverUrl: 'http://localhost:3000',
 * });
 *
 * fs.writeFileSync('openapi.json', JSON.stringify(spec, null, 2));
 * ```
 */
export function generateOpenAPI(options?: OpenAPIOptions): OpenAPISpec {
  const {
    title = 'Posts API',
    version = '1.0.0',
    description = 'Create, list, read and delete posts',
    serverUrl,
    basePath = '',
  } = options ?? {};

  const spec: OpenAPISpec = {
    openapi: '3.0.0',
    info: {
      title,
      version,
      description,
    },
    paths: {},
    components: {
      schemas: {
        Post: postSchema(),
        PostInput: postInputSchema(),
        Message: messageSchema(),
      },
      responses: {},
    },
    tags: [{ name: 'posts', description: 'Post operations' }],
  };

  if (serverUrl) {
    spec.servers = [{ url: serverUrl }];
  }

  for (const [status, text] of Object.entries(ERROR_RESPONSES)) {
    spec.components.responses[errorResponseName(status)] = {
      description: text,
      content: { [JSON_CONTENT]: { schema: ref('Message') } },
    };
  }

  const collectionPath = `${basePath}/posts`;
  const itemPath = `${collectionPath}/{id}`;

  spec.paths[collectionPath] = {
    get: listOperation(),
    post: createOperation(basePath),
  };

  spec.paths[itemPath] = {
    get: getOperation(),
    delete: deleteOperation(),
    parameters: [
      {
        name: 'id',
        in: 'path',
        required: true,
        schema: { type: 'integer', minimum: 1, maximum: MAX_POST_ID },
        description: 'Post ID',
      },
    ],
  };

  return spec;
}

/**
 * Convert a field definition to an OpenAPI schema.
 */
function fieldToSchema(field: FieldDefinition): SchemaObject {
  const schema: SchemaObject = {
    type: field.type === 'int' ? 'integer' : 'string',
  };

  if (field.readOnly) {
    schema.readOnly = true;
  }

  if (field.constraints?.minLength !== undefined) {
    schema.minLength = field.constraints.minLength;
  }

  return schema;
}

function postSchema(): SchemaObject {
  const properties: Record<string, SchemaObject> = {};
  for (const [name, field] of Object.entries(postFields)) {
    properties[name] = fieldToSchema(field);
  }

  return {
    type: 'object',
    properties,
    required: Object.keys(postFields),
  };
}

function postInputSchema(): SchemaObject {
  const properties: Record<string, SchemaObject> = {};
  const required: string[] = [];

  for (const name of POST_INPUT_FIELDS) {
    const field: FieldDefinition = postFields[name];
    properties[name] = fieldToSchema(field);
    if (field.required) {
      required.push(name);
    }
  }

  return { type: 'object', properties, required };
}

function messageSchema(): SchemaObject {
  return {
    type: 'object',
    properties: { message: { type: 'string' } },
    required: ['message'],
  };
}

// Operation creators
function listOperation(): OperationObject {
  return {
    tags: ['posts'],
    summary: 'List posts',
    operationId: 'listPosts',
    parameters: Object.keys(FILTER_PARAMS).map((name) => ({
      name,
      in: 'query',
      schema: { type: 'string' },
      description: `Only posts whose ${name.replace('_like', '')} contains this substring`,
    })),
    responses: {
      '200': {
        description: 'Matching posts, ordered by id',
        content: {
          [JSON_CONTENT]: { schema: { type: 'array', items: ref('Post') } },
        },
      },
      '406': errorRef('406'),
    },
  };
}

function getOperation(): OperationObject {
  return {
    tags: ['posts'],
    summary: 'Get a post',
    operationId: 'getPost',
    responses: {
      '200': {
        description: 'The post',
        content: { [JSON_CONTENT]: { schema: ref('Post') } },
      },
      '404': errorRef('404'),
      '406': errorRef('406'),
    },
  };
}

function createOperation(basePath: string): OperationObject {
  return {
    tags: ['posts'],
    summary: 'Create a post',
    operationId: 'createPost',
    requestBody: {
      required: true,
      content: { [JSON_CONTENT]: { schema: ref('PostInput') } },
    },
    responses: {
      '201': {
        description: 'Created',
        headers: {
          Location: {
            description: `Path of the new post, ${basePath}/posts/{id}`,
            schema: { type: 'string' },
          },
        },
        content: { [JSON_CONTENT]: { schema: ref('Post') } },
      },
      '406': errorRef('406'),
      '415': errorRef('415'),
      '422': errorRef('422'),
    },
  };
}

function deleteOperation(): OperationObject {
  return {
    tags: ['posts'],
    summary: 'Delete a post',
    operationId: 'deletePost',
    responses: {
      '200': {
        description: 'Deleted',
        content: { [JSON_CONTENT]: { schema: ref('Message') } },
      },
      '404': errorRef('404'),
      '406': errorRef('406'),
    },
  };
}

// Utility functions
function ref(schema: string): RefObject {
  return { $ref: `#/components/schemas/${schema}` };
}

function errorRef(status: string): RefObject {
  return { $ref: `#/components/responses/${errorResponseName(status)}` };
}

function errorResponseName(status: string): string {
  return `Error${status}`;
}
