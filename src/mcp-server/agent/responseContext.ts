/**
 * @fileoverview The sink agent operations write into: a process log, artifacts,
 * and replies to the caller. {@link CollectingResponseContext} records them in
 * order so the MCP layer can turn the transcript into a tool result.
 * @module src/mcp-server/agent/responseContext
 */

import { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { logger, RequestContext } from "../../utils/index.js";

/** Artifact metadata. Keys with an `undefined` value are omitted on output. */
export type ArtifactMetadata = Readonly<Record<string, string | undefined>>;

interface ArtifactBase {
  mimetype: string;
  description: string;
  metadata: ArtifactMetadata;
}

/** An artifact either carries its content inline or points at it by URL. */
export type Artifact = ArtifactBase &
  ({ content: string; uris?: undefined } | { uris: string[]; content?: undefined });

export interface AgentProcess {
  log(text: string, data?: Record<string, unknown>): Promise<void>;
  createArtifact(artifact: Artifact): Promise<void>;
}

export interface ResponseContext {
  /**
   * Opens a process with a short summary and runs `work` inside it.
   */
  beginProcess<T>(
    summary: string,
    work: (process: AgentProcess) => Promise<T>,
  ): Promise<T>;
  reply(text: string): Promise<void>;
}

export type ResponseMessage =
  | { type: "process_begin"; summary: string }
  | { type: "process_log"; text: string; data?: Record<string, unknown> }
  | { type: "artifact"; artifact: Artifact }
  | { type: "reply"; text: string };

/**
 * Records every message in memory, mirroring process logs to the
 * application logger.
 */
export class CollectingResponseContext implements ResponseContext {
  private readonly transcript: ResponseMessage[] = [];

  constructor(private readonly requestContext: RequestContext) {}

  public get messages(): readonly ResponseMessage[] {
    return this.transcript;
  }

  public get artifacts(): Artifact[] {
    return this.transcript.flatMap((m) =>
      m.type === "artifact" ? [m.artifact] : [],
    );
  }

  public get replies(): string[] {
    return this.transcript.flatMap((m) => (m.type === "reply" ? [m.text] : []));
  }

  public get logs(): string[] {
    return this.transcript.flatMap((m) =>
      m.type === "process_log" ? [m.text] : [],
    );
  }

  public async beginProcess<T>(
    summary: string,
    work: (process: AgentProcess) => Promise<T>,
  ): Promise<T> {
    this.transcript.push({ type: "process_begin", summary });
    logger.info(`Process started: ${summary}`, this.requestContext);

    const agentProcess: AgentProcess = {
      log: async (text, data) => {
        this.transcript.push(
          data === undefined
            ? { type: "process_log", text }
            : { type: "process_log", text, data },
        );
        logger.info(text, { ...this.requestContext, ...data });
      },
      createArtifact: async (artifact) => {
        this.transcript.push({ type: "artifact", artifact });
        logger.debug(`Artifact created: ${artifact.description}`, {
          ...this.requestContext,
          mimetype: artifact.mimetype,
        });
      },
    };
    return work(agentProcess);
  }

  public async reply(text: string): Promise<void> {
    this.transcript.push({ type: "reply", text });
  }
}

function definedMetadata(metadata: ArtifactMetadata): Record<string, string> {
  return Object.fromEntries(
    Object.entries(metadata).filter(
      (entry): entry is [string, string] => entry[1] !== undefined,
    ),
  );
}

/**
 * Converts a transcript into an MCP tool result: the process log as one text
 * block, inline artifacts as embedded resources, URL artifacts as resource
 * links, replies as text. Artifact metadata is returned in
 * `structuredContent`.
 */
export function toCallToolResult(
  messages: readonly ResponseMessage[],
): CallToolResult {
  const content: CallToolResult["content"] = [];
  const logLines: string[] = [];
  const artifactSummaries: Record<string, unknown>[] = [];
  const replies: string[] = [];

  for (const message of messages) {
    switch (message.type) {
      case "process_begin":
        logLines.push(`# ${message.summary}`);
        break;
      case "process_log":
        logLines.push(message.text);
        break;
      case "reply":
        replies.push(message.text);
        break;
      case "artifact": {
        const { artifact } = message;
        const metadata = definedMetadata(artifact.metadata);
        artifactSummaries.push({
          mimetype: artifact.mimetype,
          description: artifact.description,
          metadata,
          ...(artifact.uris ? { uris: artifact.uris } : {}),
        });
        if (artifact.uris) {
          for (const uri of artifact.uris) {
            content.push({
              type: "resource_link",
              uri,
              name: artifact.description,
              description: artifact.description,
              mimeType: artifact.mimetype,
            });
          }
        } else {
          content.push({
            type: "resource",
            resource: {
              uri: metadata.derived_from ?? `artifact:${artifactSummaries.length}`,
              mimeType: artifact.mimetype,
              text: artifact.content,
            },
          });
        }
        break;
      }
    }
  }

  if (logLines.length > 0) {
    content.unshift({ type: "text", text: logLines.join("\n") });
  }
  for (const text of replies) {
    content.push({ type: "text", text });
  }

  return {
    content,
    structuredContent: { artifacts: artifactSummaries, replies },
    isError: false,
  };
}
