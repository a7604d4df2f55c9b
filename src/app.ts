import cors from "cors";
import express, { Express, Request, Response } from "express";
import { JsonLlmClient, LlmClient } from "./ai/llm.client";
import { VERIFICATION_SYSTEM_PROMPT } from "./ai/system/verification.system";
import { CandidateIntakeService } from "./candidates/candidate-intake.service";
import { buildCandidatesController } from "./candidates/candidates.controller";
import { CandidatesService } from "./candidates/candidates.service";
import { EnvConfig } from "./config/env";
import { createLogger, Logger } from "./config/logger";
import { InMemoryTableClient } from "./db/memory-table.client";
import { AgentLogsRepository } from "./db/repositories/agent-logs.repo";
import { CandidatesRepository } from "./db/repositories/candidates.repo";
import { DocumentsRepository } from "./db/repositories/documents.repo";
import { SupabaseRestClient } from "./db/supabase.client";
import { TableClient } from "./db/table.client";
import { DocumentFilesService } from "./documents/document-files.service";
import { DocumentIntakeService } from "./documents/document-intake.service";
import { DocumentRequestService } from "./documents/document-request.service";
import { DocumentVerificationService } from "./documents/document-verification.service";
import { buildDocumentsController } from "./documents/documents.controller";
import { buildErrorMiddleware, sendFailure } from "./http/http-errors";
import { buildRecruiterAuth } from "./http/recruiter-auth";
import { buildRequestLogger } from "./http/request-logger";
import { buildUploadMiddleware } from "./http/uploads";
import { EmailSender, LogEmailSender, SendGridEmailSender } from "./notifications/email.sender";
import { buildPublicController } from "./public/public.controller";
import { ResumeParserService } from "./resumes/resume-parser.service";
import { ResumeTextService } from "./resumes/resume-text.service";
import { Clock, systemClock } from "./shared/utils/time";
import { SlidingWindowRateLimiter } from "./shared/utils/rate-limit";
import { FileStorageService } from "./storage/file-storage.service";

const PUBLIC_RATE_LIMIT_WINDOW_MS = 60_000;

export interface AppOverrides {
  logger?: Logger;
  tableClient?: TableClient;
  llmClient?: JsonLlmClient;
  emailSender?: EmailSender;
  clock?: Clock;
}

export interface AppContext {
  app: Express;
  logger: Logger;
  storageKind: TableClient["kind"];
}

export function createApp(env: EnvConfig, overrides: AppOverrides = {}): AppContext {
  const logger = overrides.logger ?? createLogger({ minLevel: env.logLevel });
  const clock = overrides.clock ?? systemClock;
  const app = express();

  app.use(
    cors({
      origin: env.corsOrigin === "*" ? true : env.corsOrigin.split(",").map((item) => item.trim()),
    }),
  );
  app.use(express.json({ limit: "1mb" }));
  app.use(buildRequestLogger(logger));

  const tableClient = overrides.tableClient ?? buildTableClient(env, logger);
  const llmClient = overrides.llmClient ?? new LlmClient(env.openaiApiKey, logger, env.openaiChatModel);
  const emailSender = overrides.emailSender ?? buildEmailSender(env, logger);

  const candidatesRepository = new CandidatesRepository(logger, tableClient);
  const documentsRepository = new DocumentsRepository(logger, tableClient);
  const agentLogsRepository = new AgentLogsRepository(logger, tableClient);
  const fileStorage = new FileStorageService(env.uploadDir, logger);

  const resumeTextService = new ResumeTextService(logger);
  const resumeParserService = new ResumeParserService(llmClient, logger, env.llmTimeoutMs);
  const candidateIntakeService = new CandidateIntakeService(
    candidatesRepository,
    agentLogsRepository,
    resumeTextService,
    resumeParserService,
    fileStorage,
    logger,
    clock,
  );
  const candidatesService = new CandidatesService(
    candidatesRepository,
    documentsRepository,
    agentLogsRepository,
    fileStorage,
    logger,
    clock,
  );
  const documentRequestService = new DocumentRequestService(
    candidatesRepository,
    agentLogsRepository,
    llmClient,
    emailSender,
    logger,
    {
      publicAppUrl: env.publicAppUrl,
      deadlineDays: env.documentDeadlineDays,
      llmTimeoutMs: env.llmTimeoutMs,
    },
    clock,
  );
  const documentIntakeService = new DocumentIntakeService(
    candidatesRepository,
    documentsRepository,
    agentLogsRepository,
    fileStorage,
    logger,
    clock,
  );
  const documentVerificationService = new DocumentVerificationService(
    candidatesRepository,
    documentsRepository,
    agentLogsRepository,
    logger,
    clock,
  );
  const documentFilesService = new DocumentFilesService(
    candidatesRepository,
    documentsRepository,
    fileStorage,
  );

  const upload = buildUploadMiddleware(env.maxUploadBytes);
  const requireRecruiter = buildRecruiterAuth(env.recruiterApiKey);

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({
      status: "ok",
      message: "Candidate Verify API is running",
      storage: tableClient.kind,
    });
  });

  app.use(
    "/candidates",
    buildCandidatesController({
      candidateIntakeService,
      candidatesService,
      upload,
      requireRecruiter,
      logger,
    }),
  );
  app.use(
    buildDocumentsController({
      documentRequestService,
      documentIntakeService,
      documentVerificationService,
      documentFilesService,
      upload,
      requireRecruiter,
      submitRateLimiter: new SlidingWindowRateLimiter(
        env.publicRateLimitPerMin,
        PUBLIC_RATE_LIMIT_WINDOW_MS,
      ),
    }),
  );
  app.use(buildPublicController({ candidatesService }));

  app.use((_request: Request, response: Response) => {
    sendFailure(response, { status: 404, code: "not_found", message: "Route not found" });
  });
  app.use(buildErrorMiddleware(logger));

  logger.debug("LLM system prompt loaded", { length: VERIFICATION_SYSTEM_PROMPT.length });

  return { app, logger, storageKind: tableClient.kind };
}

function buildTableClient(env: EnvConfig, logger: Logger): TableClient {
  if (env.supabaseUrl && env.supabaseApiKey) {
    return new SupabaseRestClient({ url: env.supabaseUrl, serviceRoleKey: env.supabaseApiKey });
  }
  logger.warn("Supabase is not configured, using in-memory table storage");
  return new InMemoryTableClient();
}

function buildEmailSender(env: EnvConfig, logger: Logger): EmailSender {
  if (env.sendgridApiKey && env.emailFrom) {
    return new SendGridEmailSender(env.sendgridApiKey, env.emailFrom, logger);
  }
  logger.warn("SENDGRID_API_KEY is not set, emails are written to the log");
  return new LogEmailSender(logger);
}
