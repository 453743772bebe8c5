import { IncomingMessage, ServerResponse } from "http";
import { Socket } from "net";
import { MemoryLogSink, PinoLogger } from "@logging/infrastructure";
import { LoggingOptions } from "@logging/options";
import { LoggingService, RequestContextFactory } from "@logging/services";
import { LogLevel, LogRenderer } from "@logging/value-objects";
import { LifecycleRequest, RequestLifecycle } from "./request-lifecycle";

describe("RequestLifecycle", () => {
  let sink: MemoryLogSink;
  let lifecycle: RequestLifecycle;
  let request: LifecycleRequest;
  let response: ServerResponse;

  beforeEach(() => {
    sink = new MemoryLogSink();
    const options: LoggingOptions = {
      level: LogLevel.DEBUG,
      renderer: LogRenderer.JSON,
      userHeader: "x-user-name",
      destination: sink,
    };
    const loggingService = new LoggingService(new PinoLogger(options));
    lifecycle = new RequestLifecycle(
      loggingService,
      new RequestContextFactory(options, loggingService),
    );

    request = {
      method: "GET",
      originalUrl: "/hello/world?lang=en",
      url: "/hello/world?lang=en",
      headers: { "x-user-name": "alice" },
      query: { lang: "en" },
    };
    response = new ServerResponse(new IncomingMessage(new Socket()));
  });

  describe("open", () => {
    it("should attach the scope and emit request started", () => {
      const { context, logger } = lifecycle.open(request, response);

      expect(request.requestContext).toBe(context);
      expect(request.logger).toBe(logger);
      expect(response.getHeader("x-request-id")).toBe(context.requestId);
      expect(sink.all).toHaveLength(1);
      expect(sink.all[0]).toMatchObject({
        event: "request started",
        logger: "request",
        user: "alice",
        route: "/hello/world",
        method: "GET",
        request_id: context.requestId,
        query_params: { lang: "en" },
      });
    });

    it("should reuse an already opened scope", () => {
      const first = lifecycle.open(request, response);
      const second = lifecycle.open(request, response);

      expect(second.context).toBe(first.context);
      expect(sink.events()).toEqual(["request started"]);
    });
  });

  describe("settling", () => {
    it("should complete with the response status", () => {
      lifecycle.open(request, response);
      response.statusCode = 204;

      lifecycle.complete(request, response);

      expect(request.requestOutcome).toBe("completed");
      expect(sink.byEvent("request completed")[0]).toMatchObject({
        status_code: 204,
      });
    });

    it("should complete on finish when nothing settled the request", () => {
      lifecycle.open(request, response);
      response.statusCode = 404;

      response.emit("finish");

      expect(sink.events()).toEqual(["request started", "request completed"]);
      expect(sink.byEvent("request completed")[0].status_code).toBe(404);
    });

    it("should fail with the error details and a stack", () => {
      lifecycle.open(request, response);

      lifecycle.fail(request, new TypeError("bad input"));

      expect(request.requestOutcome).toBe("failed");
      expect(sink.byEvent("request failed")[0]).toMatchObject({
        level: "error",
        error_type: "TypeError",
        error: "bad input",
        status_code: 500,
        stack: expect.stringContaining("TypeError: bad input"),
      });
    });

    it("should emit exactly one of completed or failed", () => {
      lifecycle.open(request, response);

      lifecycle.fail(request, new Error("boom"));
      lifecycle.fail(request, new Error("boom again"));
      lifecycle.complete(request, response);
      response.emit("finish");

      expect(sink.events()).toEqual(["request started", "request failed"]);
    });

    it("should do nothing for a request that was never opened", () => {
      lifecycle.complete(request, response);
      lifecycle.fail(request, new Error("boom"));

      expect(sink.all).toHaveLength(0);
    });
  });
});
