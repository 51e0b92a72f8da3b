/**
 * Short Code Generation Tests
 *
 * @see packages/shared/src/utils/shortcode.ts
 */

import { describe, it, expect, jest } from "@jest/globals";
import {
  generateCode,
  generateUniqueCode,
  CodeGenerationError,
  SHORTCODE_CONFIG,
} from "../src/index.js";

describe("Short Code Generation", () => {
  describe("generateCode", () => {
    it("should generate a code of default length 6", () => {
      const code = generateCode();
      expect(code).toHaveLength(6);
      expect(SHORTCODE_CONFIG.DEFAULT_LENGTH).toBe(6);
    });

    it("should generate a code of specified length", () => {
      expect(generateCode(10)).toHaveLength(10);
    });

    it("should only contain alphanumeric characters", () => {
      for (let i = 0; i < 200; i++) {
        expect(generateCode()).toMatch(/^[A-Za-z0-9]{6}$/);
      }
    });

    it("should use a 62 symbol alphabet", () => {
      expect(SHORTCODE_CONFIG.ALPHABET).toHaveLength(62);
      expect(new Set(SHORTCODE_CONFIG.ALPHABET).size).toBe(62);
    });

    it("should generate unique codes (statistical test)", () => {
      const codes = new Set<string>();
      const iterations = 1000;

      for (let i = 0; i < iterations; i++) {
        codes.add(generateCode());
      }

      expect(codes.size).toBe(iterations);
    });

    it("should eventually emit every symbol", () => {
      const seen = new Set(generateCode(20000));
      expect(seen.size).toBe(62);
    });

    it("should handle edge case of length 1", () => {
      expect(generateCode(1)).toMatch(/^[A-Za-z0-9]$/);
    });

    it("should reject zero, negative and fractional lengths", () => {
      expect(() => generateCode(0)).toThrow(RangeError);
      expect(() => generateCode(-3)).toThrow(RangeError);
      expect(() => generateCode(2.5)).toThrow(RangeError);
    });
  });

  describe("generateUniqueCode", () => {
    it("should return the first code that is not taken", async () => {
      const existsCheck = jest.fn<(code: string) => Promise<boolean>>().mockResolvedValue(false);

      const code = await generateUniqueCode(existsCheck);

      expect(code).toHaveLength(6);
      expect(existsCheck).toHaveBeenCalledTimes(1);
      expect(existsCheck).toHaveBeenCalledWith(code);
    });

    it("should retry when the code is taken", async () => {
      const existsCheck = jest
        .fn<(code: string) => Promise<boolean>>()
        .mockResolvedValueOnce(true)
        .mockResolvedValueOnce(true)
        .mockResolvedValueOnce(false);

      const code = await generateUniqueCode(existsCheck);

      expect(code).toHaveLength(6);
      expect(existsCheck).toHaveBeenCalledTimes(3);
    });

    it("should throw CodeGenerationError after max retries", async () => {
      const existsCheck = jest.fn<(code: string) => Promise<boolean>>().mockResolvedValue(true);

      await expect(generateUniqueCode(existsCheck)).rejects.toThrow(CodeGenerationError);
      expect(existsCheck).toHaveBeenCalledTimes(SHORTCODE_CONFIG.MAX_RETRIES);
    });

    it("should respect custom length and attempt limit", async () => {
      const existsCheck = jest.fn<(code: string) => Promise<boolean>>().mockResolvedValue(true);

      await expect(generateUniqueCode(existsCheck, 8, 2)).rejects.toThrow(
        /after 2 attempts/
      );
      expect(existsCheck).toHaveBeenCalledTimes(2);
      expect(existsCheck.mock.calls[0][0]).toHaveLength(8);
    });
  });
});
