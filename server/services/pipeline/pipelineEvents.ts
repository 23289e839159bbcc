import { EventEmitter } from "node:events";
import type { FastifyBaseLogger } from "fastify";
import { v4 as uuidv4 } from "uuid";

import type { TransitionOutcome } from "./taskStore";
import type {
  ProjectStatus,
  TaskStatus,
  TaskType,
  TranslationProject,
} from "./types";

export const PIPELINE_EVENTS = {
  TASK_COMMITTED: "pipeline.task.committed",
  PROJECT_STATUS_CHANGED: "pipeline.project.status_changed",
  STATE_CHANGED: "pipeline.state.changed",
} as const;

/** Wire shape delivered to sinks. Consumers must tolerate duplicates. */
export interface PipelineStateEvent {
  eventId: string;
  projectId: string;
  taskId?: string;
  taskType?: TaskType;
  chapterNumber?: number;
  oldStatus: TaskStatus | ProjectStatus;
  newStatus: TaskStatus | ProjectStatus;
  timestamp: string;
}

export interface ProjectStatusChangedPayload {
  project: TranslationProject;
  oldStatus: ProjectStatus;
}

export type PipelineEventPayloadMap = {
  [PIPELINE_EVENTS.TASK_COMMITTED]: TransitionOutcome;
  [PIPELINE_EVENTS.PROJECT_STATUS_CHANGED]: ProjectStatusChangedPayload;
  [PIPELINE_EVENTS.STATE_CHANGED]: PipelineStateEvent;
};

export type PipelineEventNames = keyof PipelineEventPayloadMap;

export class PipelineEventBus extends EventEmitter {
  emit<TName extends PipelineEventNames>(
    event: TName,
    payload: PipelineEventPayloadMap[TName],
  ): boolean {
    return super.emit(event, payload);
  }

  on<TName extends PipelineEventNames>(
    event: TName,
    listener: (payload: PipelineEventPayloadMap[TName]) => void,
  ): this {
    return super.on(event, listener);
  }

  off<TName extends PipelineEventNames>(
    event: TName,
    listener: (payload: PipelineEventPayloadMap[TName]) => void,
  ): this {
    return super.off(event, listener);
  }
}

export interface PipelineEventSink {
  readonly name: string;
  publish(event: PipelineStateEvent): Promise<void>;
}

export function taskStateEvents(
  outcome: TransitionOutcome,
  idFactory: () => string = uuidv4,
): PipelineStateEvent[] {
  return outcome.changes.map(({ before, after }) => ({
    eventId: idFactory(),
    projectId: after.projectId,
    taskId: after.id,
    taskType: after.taskType,
    chapterNumber: after.chapterNumber,
    oldStatus: before.status,
    newStatus: after.status,
    timestamp: after.updatedAt,
  }));
}

export function projectStateEvent(
  payload: ProjectStatusChangedPayload,
  idFactory: () => string = uuidv4,
): PipelineStateEvent {
  return {
    eventId: idFactory(),
    projectId: payload.project.id,
    oldStatus: payload.oldStatus,
    newStatus: payload.project.status,
    timestamp: payload.project.updatedAt,
  };
}

/**
 * Forwards every state change on the bus to the external sinks. Delivery is
 * fire-and-forget per sink; a failing sink is logged and never blocks the
 * pipeline.
 */
export function connectEventSinks(
  bus: PipelineEventBus,
  sinks: readonly PipelineEventSink[],
  logger: FastifyBaseLogger,
): () => void {
  const forward = (event: PipelineStateEvent) => {
    for (const sink of sinks) {
      sink.publish(event).catch((err: unknown) => {
        logger.warn(
          { err, sink: sink.name, eventId: event.eventId },
          "[PIPELINE] Event sink delivery failed",
        );
      });
    }
  };
  const onTask = (outcome: TransitionOutcome) => {
    for (const event of taskStateEvents(outcome)) {
      bus.emit(PIPELINE_EVENTS.STATE_CHANGED, event);
    }
  };
  const onProject = (payload: ProjectStatusChangedPayload) => {
    bus.emit(PIPELINE_EVENTS.STATE_CHANGED, projectStateEvent(payload));
  };

  bus.on(PIPELINE_EVENTS.STATE_CHANGED, forward);
  bus.on(PIPELINE_EVENTS.TASK_COMMITTED, onTask);
  bus.on(PIPELINE_EVENTS.PROJECT_STATUS_CHANGED, onProject);
  return () => {
    bus.off(PIPELINE_EVENTS.STATE_CHANGED, forward);
    bus.off(PIPELINE_EVENTS.TASK_COMMITTED, onTask);
    bus.off(PIPELINE_EVENTS.PROJECT_STATUS_CHANGED, onProject);
  };
}
