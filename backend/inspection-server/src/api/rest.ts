/**
 * REST API Router
 *
 * Plain HTTP endpoints for the cart controller and the vision service, which
 * do not speak tRPC. Every response uses the same envelope:
 *
 *   { status: "success", data, timestamp }
 *   { status: "error", error: { code, message }, timestamp }
 *
 * Endpoints:
 *   POST   /api/tasks/add                 - Create a pending task
 *   GET    /api/tasks                     - Pending tasks, oldest first
 *   GET    /api/tasks/all                 - Tasks in any status
 *   GET    /api/tasks/:taskId             - Get task by ID
 *   POST   /api/tasks/:taskId/assign      - Claim a pending task
 *   DELETE /api/tasks/:taskId             - Delete a task
 *   POST   /api/tasks/clear               - Remove old completed/failed tasks
 *   POST   /api/results                   - Ingest a result
 *   GET    /api/history                   - Stored results
 *   GET    /api/history/latest            - Newest result for a station
 *   GET    /api/statistics                - Counts and averages over a window
 *   GET    /api/alerts                    - Unhandled alerts
 *   POST   /api/alerts/:alertId/handled   - Mark an alert handled
 *   GET    /api/cart/status               - Cart status snapshot
 *   POST   /api/cart/status               - Report cart status
 */

import { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";
import { OperationError, OperationResult, ValidationError, fail, ok } from "../errors";
import { EnqueueInput } from "../queue/Dispatcher";
import { CartStatusUpdate, IngestInput } from "../types/results";
import { isQueueStatus } from "../queue/TaskState";
import { Context } from "./trpc";
import { httpStatusFor } from "./errors";

const DAY_MS = 24 * 60 * 60 * 1000;

type Query = Record<string, string | undefined>;

const optionalInt = z.coerce.number().int().optional();

const PendingQuerySchema = z.object({ limit: optionalInt });

const ListQuerySchema = z.object({
  status: z
    .string()
    .refine(isQueueStatus, {
      message: "status must be one of pending, assigned, completed, failed",
    })
    .optional(),
  limit: optionalInt,
});

const HistoryQueryStringSchema = z.object({
  task_type: optionalInt,
  station_id: optionalInt,
  from: z.coerce.date().optional(),
  to: z.coerce.date().optional(),
  limit: optionalInt,
  offset: optionalInt,
});

const LatestQueryStringSchema = z.object({
  station_id: z.coerce.number().int(),
  task_type: optionalInt,
});

const StatisticsQueryStringSchema = z.object({
  task_type: optionalInt,
  days: optionalInt,
});

const AlertsQuerySchema = z.object({ limit: optionalInt });

const AlertIdSchema = z.coerce.number().int().positive();

const ClearBodySchema = z
  .object({ days: z.number().min(0).default(1) })
  .default({});

function sendResult<T>(reply: FastifyReply, result: OperationResult<T>, successStatus = 200) {
  if (!result.success) {
    return sendError(reply, result.error);
  }
  return reply.status(successStatus).send({
    status: "success",
    data: result.value ?? null,
    timestamp: new Date().toISOString(),
  });
}

function sendError(reply: FastifyReply, error: OperationError) {
  return reply.status(httpStatusFor(error)).send({
    status: "error",
    error: { code: error.code, message: error.message },
    timestamp: new Date().toISOString(),
  });
}

/**
 * Parse a query string or body with zod
 */
function parseInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  context: string
): OperationResult<T> {
  const parsed = schema.safeParse(value);
  return parsed.success ? ok(parsed.data) : fail(ValidationError.fromZod(parsed.error, context));
}

/**
 * Register all REST API routes on the Fastify instance.
 *
 * @param server - Fastify server instance
 * @param ctx - Shared context with the services
 */
export async function registerRestRoutes(server: FastifyInstance, ctx: Context): Promise<void> {
  // Tasks
  server.post<{ Body: EnqueueInput }>("/api/tasks/add", async (request, reply) => {
    return sendResult(reply, ctx.dispatcher.enqueue(request.body), 201);
  });

  server.get<{ Querystring: Query }>("/api/tasks", async (request, reply) => {
    const query = parseInput(PendingQuerySchema, request.query, "query");
    if (!query.success) return sendError(reply, query.error);
    return sendResult(reply, ctx.dispatcher.listPending(query.value.limit));
  });

  server.get<{ Querystring: Query }>("/api/tasks/all", async (request, reply) => {
    const query = parseInput(ListQuerySchema, request.query, "query");
    if (!query.success) return sendError(reply, query.error);
    return sendResult(reply, ctx.dispatcher.list(query.value));
  });

  server.post<{ Body: unknown }>("/api/tasks/clear", async (request, reply) => {
    const body = parseInput(ClearBodySchema, request.body, "request body");
    if (!body.success) return sendError(reply, body.error);
    const result = ctx.dispatcher.clearCompleted(body.value.days * DAY_MS);
    if (!result.success) return sendError(reply, result.error);
    return sendResult(reply, ok({ deleted: result.value }));
  });

  server.get<{ Params: { taskId: string } }>("/api/tasks/:taskId", async (request, reply) => {
    return sendResult(reply, ctx.dispatcher.get(request.params.taskId));
  });

  server.post<{ Params: { taskId: string } }>("/api/tasks/:taskId/assign", async (request, reply) => {
    return sendResult(reply, ctx.dispatcher.assign(request.params.taskId));
  });

  server.delete<{ Params: { taskId: string } }>("/api/tasks/:taskId", async (request, reply) => {
    const { taskId } = request.params;
    const result = ctx.dispatcher.delete(taskId);
    if (!result.success) return sendError(reply, result.error);
    return sendResult(reply, ok({ taskId }));
  });

  // Results and history
  server.post<{ Body: IngestInput }>("/api/results", async (request, reply) => {
    return sendResult(reply, ctx.ingestion.ingest(request.body), 201);
  });

  server.get<{ Querystring: Query }>("/api/history", async (request, reply) => {
    const query = parseInput(HistoryQueryStringSchema, request.query, "query");
    if (!query.success) return sendError(reply, query.error);
    const { task_type, station_id, ...rest } = query.value;
    return sendResult(reply, ctx.history.list({ taskType: task_type, stationId: station_id, ...rest }));
  });

  server.get<{ Querystring: Query }>("/api/history/latest", async (request, reply) => {
    const query = parseInput(LatestQueryStringSchema, request.query, "query");
    if (!query.success) return sendError(reply, query.error);
    return sendResult(
      reply,
      ctx.history.latest({ stationId: query.value.station_id, taskType: query.value.task_type })
    );
  });

  server.get<{ Querystring: Query }>("/api/statistics", async (request, reply) => {
    const query = parseInput(StatisticsQueryStringSchema, request.query, "query");
    if (!query.success) return sendError(reply, query.error);
    return sendResult(
      reply,
      ctx.history.statistics({ taskType: query.value.task_type, days: query.value.days })
    );
  });

  // Alerts
  server.get<{ Querystring: Query }>("/api/alerts", async (request, reply) => {
    const query = parseInput(AlertsQuerySchema, request.query, "query");
    if (!query.success) return sendError(reply, query.error);
    return sendResult(reply, ctx.history.unhandledAlerts(query.value.limit));
  });

  server.post<{ Params: { alertId: string } }>("/api/alerts/:alertId/handled", async (request, reply) => {
    const alertId = parseInput(AlertIdSchema, request.params.alertId, "alert id");
    if (!alertId.success) return sendError(reply, alertId.error);
    return sendResult(reply, ctx.history.markAlertHandled(alertId.value));
  });

  // Cart
  server.get("/api/cart/status", async (_request, reply) => {
    return sendResult(reply, ctx.cart.get());
  });

  server.post<{ Body: CartStatusUpdate }>("/api/cart/status", async (request, reply) => {
    return sendResult(reply, ctx.cart.update(request.body));
  });
}
