import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { existsSync } from "node:fs";
import * as grpc from "@grpc/grpc-js";
import * as protoLoader from "@grpc/proto-loader";
import { ArenaSessionManager, parseSessionCommand, type SessionStepResponse } from "./session-manager.ts";

const SERVICE_NAME = "skirmish.v1.SkirmishService";

type CreateSessionRequest = { config_json: string };
type StepSessionRequest = { session_id: string; n_steps: number; command_json: string };
type SessionIdRequest = { session_id: string };
type CloseSessionResponse = { ok: boolean; error: string };

function parseJson(raw: string, what: string): unknown {
  if (raw.trim().length === 0) {
    return {};
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new Error(`invalid ${what}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function serviceError(name: string, err: unknown, code: grpc.status): grpc.ServerErrorResponse {
  return {
    name,
    message: err instanceof Error ? err.message : String(err),
    code,
  };
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && err.message.startsWith("session not found");
}

export function createService(manager: ArenaSessionManager): grpc.UntypedServiceImplementation {
  const createSession: grpc.handleUnaryCall<CreateSessionRequest, SessionStepResponse> = (call, callback) => {
    try {
      callback(null, manager.createSession(parseJson(call.request.config_json, "config_json")));
    } catch (err) {
      callback(serviceError("CreateSessionError", err, grpc.status.INVALID_ARGUMENT));
    }
  };

  const stepSession: grpc.handleUnaryCall<StepSessionRequest, SessionStepResponse> = (call, callback) => {
    try {
      const command = parseSessionCommand(parseJson(call.request.command_json, "command_json"));
      callback(null, manager.stepSession(call.request.session_id, command, call.request.n_steps));
    } catch (err) {
      const code = isNotFound(err) ? grpc.status.NOT_FOUND : grpc.status.INVALID_ARGUMENT;
      callback(serviceError("StepSessionError", err, code));
    }
  };

  const getSession: grpc.handleUnaryCall<SessionIdRequest, SessionStepResponse> = (call, callback) => {
    try {
      callback(null, manager.getSession(call.request.session_id));
    } catch (err) {
      callback(serviceError("GetSessionError", err, isNotFound(err) ? grpc.status.NOT_FOUND : grpc.status.INTERNAL));
    }
  };

  const closeSession: grpc.handleUnaryCall<SessionIdRequest, CloseSessionResponse> = (call, callback) => {
    const sessionId = call.request.session_id;
    const ok = manager.closeSession(sessionId);
    callback(null, ok ? { ok: true, error: "" } : { ok: false, error: `session not found: ${sessionId}` });
  };

  return {
    CreateSession: createSession,
    StepSession: stepSession,
    GetSession: getSession,
    CloseSession: closeSession,
  };
}

function resolveProtoPath(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  const protoFromCwd = resolve(process.cwd(), "proto", "skirmish_service.proto");
  const protoFromRepoSource = resolve(here, "..", "..", "..", "proto", "skirmish_service.proto");
  return existsSync(protoFromCwd) ? protoFromCwd : protoFromRepoSource;
}

export function loadSkirmishService(protoPath = resolveProtoPath()): grpc.ServiceDefinition {
  const packageDef = protoLoader.loadSync(protoPath, {
    keepCase: true,
    longs: Number,
    enums: String,
    defaults: true,
    oneofs: true,
  });
  const definition = packageDef[SERVICE_NAME];
  if (!definition || "format" in definition) {
    throw new Error(`${SERVICE_NAME} not found in ${protoPath}`);
  }
  return definition;
}

export async function startGrpcServer(port: number, manager = new ArenaSessionManager()): Promise<grpc.Server> {
  const server = new grpc.Server();
  server.addService(loadSkirmishService(), createService(manager));

  const boundPort = await new Promise<number>((resolveBind, rejectBind) => {
    server.bindAsync(`0.0.0.0:${port}`, grpc.ServerCredentials.createInsecure(), (err, actualPort) => {
      if (err) {
        rejectBind(err);
        return;
      }
      resolveBind(actualPort);
    });
  });
  console.log(`[arena grpc] listening on 0.0.0.0:${boundPort}`);
  return server;
}
