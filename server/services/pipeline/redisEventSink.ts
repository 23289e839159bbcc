import type { PipelineEventSink, PipelineStateEvent } from "./pipelineEvents";

/** The slice of the ioredis client the sink writes through. */
export interface StreamWriter {
  xadd(
    key: string,
    maxLenToken: "MAXLEN",
    approximate: "~",
    count: number,
    id: "*",
    ...fieldsAndValues: string[]
  ): Promise<string | null>;
}

export interface RedisStreamSinkOptions {
  stream: string;
  maxLength: number;
}

/** Appends every state change to a capped Redis stream for outside consumers. */
export class RedisStreamEventSink implements PipelineEventSink {
  readonly name = "redis-stream";

  constructor(
    private readonly client: StreamWriter,
    private readonly options: RedisStreamSinkOptions,
  ) {}

  async publish(event: PipelineStateEvent) {
    await this.client.xadd(
      this.options.stream,
      "MAXLEN",
      "~",
      this.options.maxLength,
      "*",
      "eventId",
      event.eventId,
      "projectId",
      event.projectId,
      "payload",
      JSON.stringify(event),
    );
  }
}
