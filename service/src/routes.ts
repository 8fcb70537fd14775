/**
 * Catalog REST Routes
 *
 * Administration API over a CatalogStore, mounted at /v1. Handlers throw
 * catalog errors and {@link catalogErrorResponse} turns them into the JSON
 * error body.
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { z, ZodError } from 'zod';
import {
  CatalogError,
  CatalogErrorCode,
  formatType,
  type CatalogStore,
  type ColumnHandle,
  type Logger,
  type TableLayout,
} from '@fibermeta/core';

// ============================================================================
// Types
// ============================================================================

/** Error response body */
interface CatalogErrorResponse {
  error: {
    message: string;
    type: string;
    code: number;
  };
}

/** Status codes the API answers errors with */
type ErrorStatus = 400 | 404 | 409 | 500;

/** Request body for creating a database */
const createDatabaseRequest = z.object({
  name: z.string().min(1),
  comment: z.string().optional(),
  owner: z.string().optional(),
});

/** Request body for creating a table */
const createTableRequest = z.object({
  name: z.string().min(1),
  columns: z.array(z.object({ name: z.string().min(1), type: z.string().min(1) })).min(1),
  storageFormat: z.enum(['parquet', 'orc', 'text']).optional(),
  fiber: z
    .object({
      fiberKey: z.string().optional(),
      function: z.string().optional(),
      timeKey: z.string().optional(),
    })
    .optional(),
});

/** Request body for registering a fiber file */
const addFiberFileRequest = z.object({
  fiberValue: z.number().int().nonnegative(),
  timeBegin: z.number().int(),
  timeEnd: z.number().int(),
  path: z.string().min(1),
});

/** An integer query parameter; an empty value counts as absent */
function optionalInteger<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema.optional());
}

/** Query of the file listing */
const listFiberFilesQuery = z.object({
  fiber: optionalInteger(z.coerce.number().int().nonnegative()),
  from: optionalInteger(z.coerce.number().int()),
  to: optionalInteger(z.coerce.number().int()),
});

// ============================================================================
// Helpers
// ============================================================================

function toErrorStatus(statusCode: number): ErrorStatus {
  switch (statusCode) {
    case 400:
    case 404:
    case 409:
      return statusCode;
    default:
      return 500;
  }
}

/**
 * Create an error response.
 */
function errorResponse(c: Context, message: string, type: string, status: ErrorStatus): Response {
  const body: CatalogErrorResponse = {
    error: {
      message,
      type,
      code: status,
    },
  };
  return c.json(body, status);
}

/**
 * Map a thrown error to its response. Catalog errors carry their own status,
 * malformed requests answer 400, and anything else is logged and answers 500.
 */
export function catalogErrorResponse(c: Context, error: unknown, logger: Logger): Response {
  if (error instanceof CatalogError) {
    const status = toErrorStatus(error.statusCode);
    if (status === 500) {
      logger.error({ err: error, path: c.req.path }, 'catalog failure');
    }
    return errorResponse(c, error.message, error.code, status);
  }
  if (error instanceof ZodError) {
    const message = error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return errorResponse(c, message, CatalogErrorCode.INVALID_INPUT, 400);
  }
  if (error instanceof SyntaxError) {
    return errorResponse(c, 'Request body is not valid JSON', CatalogErrorCode.INVALID_INPUT, 400);
  }

  logger.error({ err: error, path: c.req.path }, 'unhandled error');
  return errorResponse(
    c,
    error instanceof Error ? error.message : 'Internal server error',
    'INTERNAL_ERROR',
    500
  );
}

function columnJson(column: ColumnHandle): { name: string; type: string; role: string } {
  return { name: column.name, type: formatType(column.type), role: column.role };
}

function layoutJson(layout: TableLayout) {
  return {
    table: layout.table,
    fiberColumn: layout.fiberColumn ? columnJson(layout.fiberColumn) : null,
    timeColumn: layout.timeColumn ? columnJson(layout.timeColumn) : null,
    partitionFunction: layout.partitionFunction?.name ?? null,
    storageFormat: layout.storageFormat,
  };
}

// ============================================================================
// Routes
// ============================================================================

/**
 * Create the catalog routes.
 */
export function createCatalogRoutes(store: CatalogStore): Hono {
  const api = new Hono();

  // -------------------------------------------------------------------------
  // Databases
  // -------------------------------------------------------------------------

  api.get('/databases', async (c) => {
    return c.json({ databases: await store.listDatabases() });
  });

  api.post('/databases', async (c) => {
    const body = createDatabaseRequest.parse(await c.req.json());
    const database = await store.createDatabase(body.name, {
      comment: body.comment,
      owner: body.owner,
    });
    return c.json(database, 201);
  });

  api.get('/databases/:db', async (c) => {
    return c.json(await store.getDatabase(c.req.param('db')));
  });

  // -------------------------------------------------------------------------
  // Tables
  // -------------------------------------------------------------------------

  api.get('/tables', async (c) => {
    const tables = await store.listTables(c.req.query('schema'), c.req.query('table'));
    return c.json({ tables });
  });

  api.post('/databases/:db/tables', async (c) => {
    const body = createTableRequest.parse(await c.req.json());
    const handle = await store.createTable(
      {
        schema: c.req.param('db'),
        name: body.name,
        columns: body.columns,
        storageFormat: body.storageFormat,
      },
      body.fiber
    );
    return c.json(handle, 201);
  });

  api.get('/databases/:db/tables/:table', async (c) => {
    return c.json(await store.getTableHandle(c.req.param('db'), c.req.param('table')));
  });

  api.get('/databases/:db/tables/:table/layout', async (c) => {
    const layout = await store.getTableLayout(c.req.param('db'), c.req.param('table'));
    return c.json(layoutJson(layout));
  });

  api.get('/databases/:db/tables/:table/columns', async (c) => {
    const columns = await store.getColumns(c.req.param('db'), c.req.param('table'));
    return c.json({ columns: columns.map(columnJson) });
  });

  // -------------------------------------------------------------------------
  // Fibers
  // -------------------------------------------------------------------------

  api.get('/databases/:db/tables/:table/fibers', async (c) => {
    const fibers = await store.listFibers(c.req.param('db'), c.req.param('table'));
    return c.json({ fibers });
  });

  api.get('/databases/:db/tables/:table/files', async (c) => {
    const query = listFiberFilesQuery.parse(c.req.query());
    const files = await store.listFiberFiles(c.req.param('db'), c.req.param('table'), {
      fiberValue: query.fiber,
      from: query.from,
      to: query.to,
    });
    return c.json({ files });
  });

  api.post('/databases/:db/tables/:table/files', async (c) => {
    const body = addFiberFileRequest.parse(await c.req.json());
    const file = await store.addFiberFile(c.req.param('db'), c.req.param('table'), body);
    return c.json(file, 201);
  });

  return api;
}
