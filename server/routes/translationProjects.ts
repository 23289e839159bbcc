import type { FastifyBaseLogger, FastifyPluginAsync, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";

import { projectConfigOverridesSchema } from "../config/pipelineConfiguration";
import { PipelineCommandError, type PipelineCommandErrorCode } from "../services/pipeline/errors";
import type { TranslationPipelineOrchestrator } from "../services/pipeline/orchestrator";
import { PROJECT_STATUSES, TASK_STATUSES, TASK_TYPES } from "../services/pipeline/types";

export interface TranslationProjectRoutesOptions {
  orchestrator: TranslationPipelineOrchestrator;
  requireAuth: (request: FastifyRequest, reply: FastifyReply) => Promise<unknown>;
}

const COMMAND_ERROR_STATUS: Record<PipelineCommandErrorCode, number> = {
  project_not_found: 404,
  task_not_found: 404,
  invalid_project_state: 409,
  invalid_request: 422,
  invalid_config: 422,
  no_chapters: 422,
  no_provider: 422,
};

const createProjectSchema = z.object({
  name: z.string().trim().min(1).max(200),
  description: z.string().max(2000).nullable().optional(),
  sourceNovelId: z.string().min(1),
  sourceLanguage: z.string().min(2).max(16),
  targetLanguage: z.string().min(2).max(16),
  startChapter: z.number().int().positive().optional(),
  endChapter: z.number().int().positive().nullable().optional(),
  config: projectConfigOverridesSchema.optional(),
});

const projectParamsSchema = z.object({ projectId: z.string().min(1) });
const taskParamsSchema = z.object({ taskId: z.string().min(1) });

const listProjectsQuerySchema = z.object({
  status: z
    .string()
    .optional()
    .transform((value) => (value ? value.split(",") : undefined))
    .pipe(z.array(z.enum(PROJECT_STATUSES)).optional()),
});

const listTasksQuerySchema = z.object({
  status: z.enum(TASK_STATUSES).optional(),
  taskType: z.enum(TASK_TYPES).optional(),
  chapterNumber: z.coerce.number().int().positive().optional(),
});

const chapterPageQuerySchema = z.object({
  page: z.coerce.number().int().positive().default(1),
  pageSize: z.coerce.number().int().min(1).max(100).default(20),
});

const verifyMappingSchema = z.object({
  originalName: z.string().trim().min(1),
  translatedName: z.string().trim().min(1).optional(),
  notes: z.string().max(2000).nullable().optional(),
});

class RequestValidationError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super("Invalid request");
    this.name = "RequestValidationError";
  }
}

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new RequestValidationError(parsed.error.issues);
  }
  return parsed.data;
}

function sendError(
  reply: FastifyReply,
  log: FastifyBaseLogger,
  error: unknown,
  context: string,
) {
  if (error instanceof RequestValidationError) {
    return reply.status(400).send({
      error: error.message,
      issues: error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    });
  }
  if (error instanceof PipelineCommandError) {
    return reply
      .status(COMMAND_ERROR_STATUS[error.code])
      .send({ error: error.message, code: error.code });
  }
  log.error({ err: error }, `[PIPELINE] ${context}`);
  return reply.status(500).send({ error: context });
}

type ProjectCommand = "start" | "pause" | "resume" | "cancel" | "restart";

const translationProjectRoutes: FastifyPluginAsync<
  TranslationProjectRoutesOptions
> = async (fastify, { orchestrator, requireAuth }) => {
  const guarded = { preHandler: requireAuth };

  fastify.post("/translation-projects", guarded, async (request, reply) => {
    try {
      const body = parse(createProjectSchema, request.body);
      const project = await orchestrator.createProject(body, request.userId);
      return reply.status(201).send({ project });
    } catch (error) {
      return sendError(reply, request.log, error, "Failed to create project");
    }
  });

  fastify.get("/translation-projects", guarded, async (request, reply) => {
    try {
      const { status } = parse(listProjectsQuerySchema, request.query);
      const projects = await orchestrator.listProjects(status);
      return reply.send({ projects });
    } catch (error) {
      return sendError(reply, request.log, error, "Failed to list projects");
    }
  });

  fastify.get(
    "/translation-projects/:projectId",
    guarded,
    async (request, reply) => {
      try {
        const { projectId } = parse(projectParamsSchema, request.params);
        const progress = await orchestrator.getProjectProgress(projectId);
        return reply.send(progress);
      } catch (error) {
        return sendError(reply, request.log, error, "Failed to load project progress");
      }
    },
  );

  const commands: Record<ProjectCommand, (projectId: string) => Promise<unknown>> = {
    start: (projectId) => orchestrator.startProject(projectId),
    pause: (projectId) => orchestrator.pauseProject(projectId),
    resume: (projectId) => orchestrator.resumeProject(projectId),
    cancel: (projectId) => orchestrator.cancelProject(projectId),
    restart: (projectId) => orchestrator.restartProject(projectId),
  };

  for (const [command, run] of Object.entries(commands)) {
    fastify.post(
      `/translation-projects/:projectId/${command}`,
      guarded,
      async (request, reply) => {
        try {
          const { projectId } = parse(projectParamsSchema, request.params);
          const project = await run(projectId);
          return reply.send({ project });
        } catch (error) {
          return sendError(reply, request.log, error, `Failed to ${command} project`);
        }
      },
    );
  }

  fastify.get(
    "/translation-projects/:projectId/tasks",
    guarded,
    async (request, reply) => {
      try {
        const { projectId } = parse(projectParamsSchema, request.params);
        const filter = parse(listTasksQuerySchema, request.query);
        const tasks = await orchestrator.listTasks(projectId, filter);
        return reply.send({ tasks });
      } catch (error) {
        return sendError(reply, request.log, error, "Failed to list tasks");
      }
    },
  );

  fastify.get(
    "/translation-projects/tasks/:taskId",
    guarded,
    async (request, reply) => {
      try {
        const { taskId } = parse(taskParamsSchema, request.params);
        const detail = await orchestrator.getTaskDetail(taskId);
        return reply.send(detail);
      } catch (error) {
        return sendError(reply, request.log, error, "Failed to load task");
      }
    },
  );

  fastify.get(
    "/translation-projects/:projectId/chapters",
    guarded,
    async (request, reply) => {
      try {
        const { projectId } = parse(projectParamsSchema, request.params);
        const page = parse(chapterPageQuerySchema, request.query);
        const { items, total } = await orchestrator.listTranslatedChapters(
          projectId,
          page,
        );
        return reply.send({ chapters: items, total, ...page });
      } catch (error) {
        return sendError(reply, request.log, error, "Failed to list translated chapters");
      }
    },
  );

  fastify.get(
    "/translation-projects/:projectId/character-mappings",
    guarded,
    async (request, reply) => {
      try {
        const { projectId } = parse(projectParamsSchema, request.params);
        const mappings = await orchestrator.listCharacterMappings(projectId);
        return reply.send({ mappings });
      } catch (error) {
        return sendError(reply, request.log, error, "Failed to list character mappings");
      }
    },
  );

  fastify.post(
    "/translation-projects/:projectId/character-mappings/verify",
    guarded,
    async (request, reply) => {
      try {
        const { projectId } = parse(projectParamsSchema, request.params);
        const body = parse(verifyMappingSchema, request.body);
        const mapping = await orchestrator.verifyCharacterMapping(
          projectId,
          body.originalName,
          {
            translatedName: body.translatedName,
            verifiedBy: request.userId ?? "unknown",
            notes: body.notes ?? null,
          },
        );
        return reply.send({ mapping });
      } catch (error) {
        return sendError(reply, request.log, error, "Failed to verify character mapping");
      }
    },
  );
};

export default translationProjectRoutes;
