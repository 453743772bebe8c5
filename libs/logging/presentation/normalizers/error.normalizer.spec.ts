import {
  BadRequestException,
  HttpException,
  InternalServerErrorException,
  NotFoundException,
} from "@nestjs/common";
import { ErrorNormalizer } from "./error.normalizer";

describe("ErrorNormalizer", () => {
  describe("HttpException", () => {
    it("should keep the status and message of a server error", () => {
      expect(
        ErrorNormalizer.normalize(
          new InternalServerErrorException("Simulated error occurred"),
        ),
      ).toEqual({
        type: "InternalServerErrorException",
        code: "INTERNAL_ERROR",
        message: "Simulated error occurred",
        status: 500,
        stack: expect.any(String),
      });
    });

    it("should fall back to the default message", () => {
      expect(ErrorNormalizer.normalize(new NotFoundException())).toEqual({
        type: "NotFoundException",
        code: "NOT_FOUND",
        message: "Not Found",
        status: 404,
        stack: expect.any(String),
      });
    });

    it("should join validation messages", () => {
      const normalized = ErrorNormalizer.normalize(
        new BadRequestException(["name must be a string", "age must be an integer"]),
      );

      expect(normalized.message).toBe(
        "name must be a string; age must be an integer",
      );
      expect(normalized.code).toBe("BAD_REQUEST");
    });

    it("should map unknown statuses to HTTP_<status>", () => {
      expect(ErrorNormalizer.normalize(new HttpException("teapot", 418))).toEqual({
        type: "HttpException",
        code: "HTTP_418",
        message: "teapot",
        status: 418,
        stack: expect.any(String),
      });
    });
  });

  describe("Error", () => {
    it("should report the class name and answer 500", () => {
      expect(ErrorNormalizer.normalize(new TypeError("bad input"))).toEqual({
        type: "TypeError",
        code: "INTERNAL_ERROR",
        message: "bad input",
        status: 500,
        stack: expect.any(String),
      });
    });

    it("should keep the first stack frames only", () => {
      const error = new Error("deep");
      const frames = Array.from(
        { length: 9 },
        (_, index) => `    at frame${index} (file.ts:${index}:1)`,
      );
      error.stack = ["Error: deep", ...frames].join("\n");

      const { stack } = ErrorNormalizer.normalize(error);

      expect(stack?.split("\n")).toEqual([
        "Error: deep",
        "    at frame0 (file.ts:0:1)",
        "    at frame1 (file.ts:1:1)",
        "    at frame2 (file.ts:2:1)",
        "    at frame3 (file.ts:3:1)",
        "    at frame4 (file.ts:4:1)",
      ]);
    });

    it("should keep a string code carried by the error", () => {
      const error = Object.assign(new Error("boom"), { code: "E_BOOM" });

      expect(ErrorNormalizer.normalize(error).code).toBe("E_BOOM");
    });

    it("should truncate long messages", () => {
      const { message } = ErrorNormalizer.normalize(new Error("x".repeat(300)));

      expect(message).toHaveLength(200);
      expect(message.endsWith("...")).toBe(true);
    });
  });

  describe("non-errors", () => {
    it("should describe a thrown string", () => {
      expect(ErrorNormalizer.normalize("oops")).toEqual({
        type: "string",
        code: "UNKNOWN",
        message: "oops",
        status: 500,
      });
      expect(ErrorNormalizer.normalize("oops").stack).toBeUndefined();
    });

    it("should serialize a thrown object", () => {
      expect(ErrorNormalizer.normalize({ reason: "nope" }).message).toBe(
        '{"reason":"nope"}',
      );
    });
  });
});
