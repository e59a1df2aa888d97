/**
 * Calculator HTTP Routes
 *
 * Thin presentation layer: validates input, calls the engine, records session
 * events and shapes responses.
 */

import { VERSION } from "@dealcalc/shared-utils";
import type { Logger } from "@dealcalc/shared-utils";
import { Router } from "express";
import type { Request, Response } from "express";
import { analyzeDeal, DEFAULT_MODEL, defaultFinancing, defaultOperations } from "../core/analyze";
import type { DealInputs } from "../core/dto";
import type {
  ConfigurationRepoPort,
  ReportRendererPort,
  SampleSourcePort,
} from "../core/ports";
import { generateReport } from "../core/report";
import {
  configurationCreateSchema,
  dealInputsSchema,
  reportRequestSchema,
} from "../core/schemas";
import type {
  ConfigurationCreateRequest,
  DealInputsRequest,
  ReportRequest,
} from "../core/schemas";
import type { SessionContext, SessionStore } from "../core/session";
import { CalculatorMiddleware, HttpError, sendData, sendError } from "./middleware";

export const SESSION_HEADER = "x-session-id";

export interface RouteDependencies {
  configurations: ConfigurationRepoPort;
  samples: SampleSourcePort;
  renderer: ReportRendererPort;
  sessions: SessionStore;
  logger: Logger;
}

export class CalculatorRoutes {
  private router: Router;

  constructor(
    private deps: RouteDependencies,
    private middleware: CalculatorMiddleware
  ) {
    this.router = Router();
    this.setupRoutes();
  }

  getRouter(): Router {
    return this.router;
  }

  private setupRoutes(): void {
    const m = this.middleware;

    this.router.get("/health", m.handle(this.handleHealth.bind(this)));
    this.router.get("/defaults", m.handle(this.handleDefaults.bind(this)));

    // ===== Analysis =====
    this.router.post("/analyze", m.withBody(dealInputsSchema, this.handleAnalyze.bind(this)));
    this.router.post("/report", m.withBody(reportRequestSchema, this.handleReport.bind(this)));

    // ===== Sessions =====
    this.router.post("/sessions", m.handle(this.handleCreateSession.bind(this)));
    this.router.get("/sessions/:id", m.handle(this.handleGetSession.bind(this)));

    // ===== Saved configurations =====
    this.router.get("/configurations", m.handle(this.handleListConfigurations.bind(this)));
    this.router.post(
      "/configurations",
      m.withBody(configurationCreateSchema, this.handleSaveConfiguration.bind(this))
    );
    this.router.get("/configurations/:id", m.handle(this.handleGetConfiguration.bind(this)));
    this.router.delete("/configurations/:id", m.handle(this.handleDeleteConfiguration.bind(this)));

    // ===== Samples =====
    this.router.get("/samples", m.handle(this.handleListSamples.bind(this)));
    this.router.get("/samples/:id", m.handle(this.handleGetSample.bind(this)));
  }

  // ===== Handlers =====

  private async handleHealth(_req: Request, res: Response): Promise<void> {
    res.json({
      status: "healthy",
      service: "calculator",
      version: VERSION,
      timestamp: new Date().toISOString(),
    });
  }

  private async handleDefaults(_req: Request, res: Response): Promise<void> {
    const defaults: DealInputs = {
      model: DEFAULT_MODEL,
      financing: defaultFinancing(),
      operations: defaultOperations(),
    };
    sendData(res, defaults);
  }

  private async handleAnalyze(
    body: DealInputsRequest,
    req: Request,
    res: Response
  ): Promise<void> {
    const session = this.sessionFrom(req);
    const analysis = analyzeDeal(body.financing, body.operations, body.model);
    session?.recordAnalysis(body);
    sendData(res, analysis);
  }

  private async handleReport(
    body: ReportRequest,
    req: Request,
    res: Response
  ): Promise<void> {
    const session = this.sessionFrom(req);
    const inputs: DealInputs = {
      model: body.model,
      financing: body.financing,
      operations: body.operations,
    };

    const result = await generateReport(
      {
        title: body.title,
        notes: body.notes,
        inputs,
        analysis: analyzeDeal(inputs.financing, inputs.operations, inputs.model),
      },
      this.deps.renderer
    );

    if (!result.ok) {
      this.deps.logger.warn(`Report generation failed: ${result.error}`);
      session?.record("report_failed");
      sendError(res, 422, result.error);
      return;
    }

    session?.record("report_generated", { bytes: result.bytes.byteLength });
    res
      .status(200)
      .type("application/pdf")
      .setHeader("Content-Disposition", `attachment; filename="${result.filename}"`);
    res.send(Buffer.from(result.bytes));
  }

  private async handleCreateSession(_req: Request, res: Response): Promise<void> {
    const session = this.deps.sessions.create();
    sendData(res, { id: session.id, startedAt: session.startedAt }, 201);
  }

  private async handleGetSession(req: Request, res: Response): Promise<void> {
    const session = this.deps.sessions.get(req.params.id);
    if (!session) {
      throw new HttpError(404, `Session not found: ${req.params.id}`);
    }

    sendData(res, {
      id: session.id,
      startedAt: session.startedAt,
      snapshot: session.snapshot(),
      counters: session.counters(),
      events: session.events(),
    });
  }

  private async handleListConfigurations(_req: Request, res: Response): Promise<void> {
    sendData(res, await this.deps.configurations.list());
  }

  private async handleSaveConfiguration(
    body: ConfigurationCreateRequest,
    req: Request,
    res: Response
  ): Promise<void> {
    const session = this.sessionFrom(req);
    const saved = await this.deps.configurations.save(body);
    session?.record("configuration_saved", { id: saved.id });
    this.deps.logger.info(`Saved configuration ${saved.id} (${saved.name})`);
    sendData(res, saved, 201);
  }

  private async handleGetConfiguration(req: Request, res: Response): Promise<void> {
    const saved = await this.deps.configurations.getById(req.params.id);
    if (!saved) {
      throw new HttpError(404, `Configuration not found: ${req.params.id}`);
    }
    sendData(res, saved);
  }

  private async handleDeleteConfiguration(req: Request, res: Response): Promise<void> {
    const deleted = await this.deps.configurations.delete(req.params.id);
    if (!deleted) {
      throw new HttpError(404, `Configuration not found: ${req.params.id}`);
    }
    res.status(204).end();
  }

  private async handleListSamples(_req: Request, res: Response): Promise<void> {
    sendData(res, await this.deps.samples.list());
  }

  private async handleGetSample(req: Request, res: Response): Promise<void> {
    const session = this.sessionFrom(req);
    const sample = await this.deps.samples.get(req.params.id);
    if (!sample) {
      throw new HttpError(404, `Sample not found: ${req.params.id}`);
    }

    session?.record("sample_loaded", { id: sample.id });
    sendData(res, {
      sample,
      analysis: analyzeDeal(sample.financing, sample.operations, sample.model),
    });
  }

  /**
   * Resolve the caller's session from the header, if one was sent
   */
  private sessionFrom(req: Request): SessionContext | null {
    const id = req.get(SESSION_HEADER);
    if (!id) return null;

    const session = this.deps.sessions.get(id);
    if (!session) {
      throw new HttpError(404, `Session not found: ${id}`);
    }
    return session;
  }
}
