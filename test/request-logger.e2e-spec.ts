import { Controller, Get, INestApplication } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { Test, TestingModule } from "@nestjs/testing";
import request from "supertest";
import { LoggingModule } from "@logging";
import { BoundLogger, RequestContext } from "@logging/domain";
import { LOGGING_OPTIONS, LoggingOptions } from "@logging/options";
import { MemoryLogSink } from "@logging/infrastructure";
import { CurrentRequestContext, RequestLogger } from "@logging/presentation";
import { LogLevel, LogRenderer } from "@logging/value-objects";

@Controller("scope")
class ScopeController {
  @Get()
  scope(@RequestLogger() logger: BoundLogger): { ok: true } {
    logger.info("scope hit");
    return { ok: true };
  }

  @Get("context")
  context(@CurrentRequestContext() context: RequestContext): {
    user: string | null;
    route: string;
  } {
    return { user: context.user ?? null, route: context.route };
  }
}

describe("Request-scoped parameters without the context middleware (e2e)", () => {
  let app: INestApplication;
  let sink: MemoryLogSink;

  beforeEach(async () => {
    sink = new MemoryLogSink();
    const options: LoggingOptions = {
      level: LogLevel.DEBUG,
      renderer: LogRenderer.JSON,
      userHeader: "x-user-name",
      destination: sink,
    };

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [ConfigModule.forRoot({ ignoreEnvFile: true }), LoggingModule],
      controllers: [ScopeController],
    })
      .overrideProvider(LOGGING_OPTIONS)
      .useValue(options)
      .compile();

    app = moduleFixture.createNestApplication({ logger: false });
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  it("should fall back to the request logger bound with route and method", async () => {
    await request(app.getHttpServer())
      .get("/scope")
      .set("X-User-Name", "alice")
      .expect(200);

    expect(sink.events()).toEqual(["scope hit"]);

    const [record] = sink.all;
    expect(record).toMatchObject({
      logger: "request",
      route: "/scope",
      method: "GET",
    });
    expect(record).not.toHaveProperty("user");
    expect(record).not.toHaveProperty("request_id");
  });

  it("should build the request context on demand", async () => {
    const response = await request(app.getHttpServer())
      .get("/scope/context?verbose=1")
      .set("X-User-Name", "alice")
      .expect(200);

    expect(response.body).toEqual({ user: "alice", route: "/scope/context" });
  });
});
