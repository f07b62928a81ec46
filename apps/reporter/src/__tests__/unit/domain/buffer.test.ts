import { describe, it, expect } from "vitest";
import { SwapBuffer } from "../../../domain/buffer/index.js";

describe("SwapBuffer", () => {
  describe("append", () => {
    it("should add single item", () => {
      const buffer = new SwapBuffer<number>();
      buffer.append(1);
      expect(buffer.size()).toBe(1);
      expect(buffer.isEmpty()).toBe(false);
    });

    it("should add array of items", () => {
      const buffer = new SwapBuffer<number>();
      buffer.appendMany([1, 2, 3]);
      expect(buffer.size()).toBe(3);
    });

    it("should handle empty array", () => {
      const buffer = new SwapBuffer<number>();
      buffer.appendMany([]);
      expect(buffer.isEmpty()).toBe(true);
    });
  });

  describe("drainAll", () => {
    it("should return items in append order", () => {
      const buffer = new SwapBuffer<number>();
      buffer.append(1);
      buffer.appendMany([2, 3]);
      expect(buffer.drainAll()).toEqual([1, 2, 3]);
    });

    it("should leave an empty epoch behind", () => {
      const buffer = new SwapBuffer<number>();
      buffer.appendMany([1, 2, 3]);
      buffer.drainAll();
      expect(buffer.size()).toBe(0);
      expect(buffer.isEmpty()).toBe(true);
    });

    it("should return empty array for empty buffer", () => {
      const buffer = new SwapBuffer<number>();
      expect(buffer.drainAll()).toEqual([]);
      expect(buffer.drainAll()).toEqual([]);
    });

    it("should not let appends after a drain reach the drained batch", () => {
      const buffer = new SwapBuffer<number>();
      buffer.appendMany([1, 2]);

      const drained = buffer.drainAll();
      buffer.append(3);

      expect(drained).toEqual([1, 2]);
      expect(buffer.drainAll()).toEqual([3]);
    });

    it("should return every item exactly once across interleaved drains", () => {
      const buffer = new SwapBuffer<number>();
      const drained: number[][] = [];

      for (let i = 0; i < 100; i++) {
        buffer.append(i);
        if (i % 7 === 0) drained.push(buffer.drainAll());
        if (i % 13 === 0) drained.push(buffer.drainAll());
      }
      drained.push(buffer.drainAll());

      expect(drained.flat()).toEqual(Array.from({ length: 100 }, (_, i) => i));
    });

    it("should keep each task's order when async producers interleave", async () => {
      const buffer = new SwapBuffer<string>();
      const drained: string[] = [];

      const producer = async (tag: string) => {
        for (let i = 0; i < 20; i++) {
          buffer.append(`${tag}${i}`);
          await Promise.resolve();
        }
      };
      const drainer = async () => {
        for (let i = 0; i < 30; i++) {
          drained.push(...buffer.drainAll());
          await Promise.resolve();
        }
      };

      await Promise.all([producer("a"), producer("b"), drainer()]);
      drained.push(...buffer.drainAll());

      expect(drained).toHaveLength(40);
      expect(new Set(drained).size).toBe(40);
      expect(drained.filter((item) => item.startsWith("a"))).toEqual(
        Array.from({ length: 20 }, (_, i) => `a${i}`)
      );
      expect(drained.filter((item) => item.startsWith("b"))).toEqual(
        Array.from({ length: 20 }, (_, i) => `b${i}`)
      );
    });
  });
});
