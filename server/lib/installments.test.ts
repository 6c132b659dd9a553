import { describe, expect, it } from "vitest";
import { ValidationError } from "./errors";
import {
  addMonthsISO,
  generateInstallmentPlan,
  isISODate,
  roundingDrift,
  toCents,
} from "./installments";

describe("toCents", () => {
  it("rounds half cents up on the decimal value", () => {
    expect(toCents(1.005)).toBe(101);
    expect(toCents(1.015)).toBe(102);
    expect(toCents(0.285)).toBe(29);
  });

  it("keeps whole cents exact", () => {
    expect(toCents(1000)).toBe(100000);
    expect(toCents(33.33)).toBe(3333);
    expect(toCents(0.1 + 0.2)).toBe(30);
  });
});

describe("addMonthsISO", () => {
  it("keeps the day of month", () => {
    expect(addMonthsISO("2024-01-15", 1)).toBe("2024-02-15");
    expect(addMonthsISO("2024-01-15", 11)).toBe("2024-12-15");
  });

  it("clamps to the last day of shorter months", () => {
    expect(addMonthsISO("2024-01-31", 1)).toBe("2024-02-29");
    expect(addMonthsISO("2023-01-31", 1)).toBe("2023-02-28");
    expect(addMonthsISO("2024-03-31", 1)).toBe("2024-04-30");
  });

  it("does not carry a clamp into later months", () => {
    expect(addMonthsISO("2024-01-31", 2)).toBe("2024-03-31");
  });

  it("rolls over year boundaries", () => {
    expect(addMonthsISO("2024-11-10", 3)).toBe("2025-02-10");
    expect(addMonthsISO("2024-01-10", 360)).toBe("2054-01-10");
  });
});

describe("isISODate", () => {
  it("accepts real calendar dates only", () => {
    expect(isISODate("2024-02-29")).toBe(true);
    expect(isISODate("2023-02-29")).toBe(false);
    expect(isISODate("2024-13-01")).toBe(false);
    expect(isISODate("15/01/2024")).toBe(false);
  });
});

describe("generateInstallmentPlan", () => {
  it("splits 12000 into twelve monthly installments of 1000", () => {
    const plan = generateInstallmentPlan(12000, 12, "2024-01-15");

    expect(plan).toHaveLength(12);
    expect(plan.map((item) => item.number)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]);
    expect(plan.every((item) => item.amount === 1000)).toBe(true);
    expect(plan[0].dueDate).toBe("2024-01-15");
    expect(plan[1].dueDate).toBe("2024-02-15");
    expect(plan[11].dueDate).toBe("2024-12-15");
  });

  it("produces strictly increasing due dates", () => {
    const plan = generateInstallmentPlan(5000, 24, "2024-01-31");
    for (let i = 1; i < plan.length; i++) {
      expect(plan[i].dueDate > plan[i - 1].dueDate).toBe(true);
    }
    expect(plan[1].dueDate).toBe("2024-02-29");
    expect(plan[2].dueDate).toBe("2024-03-31");
  });

  it("returns a single installment for the whole value", () => {
    expect(generateInstallmentPlan(850.5, 1, "2024-06-10")).toEqual([
      { number: 1, dueDate: "2024-06-10", amount: 850.5 },
    ]);
  });

  it("rounds to cents and leaves the remainder as drift", () => {
    const plan = generateInstallmentPlan(100, 3, "2024-01-10");
    expect(plan.map((item) => item.amount)).toEqual([33.33, 33.33, 33.33]);
    expect(roundingDrift(100, plan)).toBe(0.01);
  });

  it("charges a half-cent total as the next cent", () => {
    expect(generateInstallmentPlan(1.005, 1, "2024-01-10")[0].amount).toBe(1.01);
  });

  it("rounds half cents up", () => {
    const plan = generateInstallmentPlan(0.05, 2, "2024-01-10");
    expect(plan[0].amount).toBe(0.03);
    expect(roundingDrift(0.05, plan)).toBe(-0.01);
  });

  it("accepts the maximum of 360 installments", () => {
    const plan = generateInstallmentPlan(360000, 360, "2024-01-05");
    expect(plan).toHaveLength(360);
    expect(plan[359]).toEqual({ number: 360, dueDate: "2053-12-05", amount: 1000 });
  });

  it.each([0, 361, -1, 1.5])("rejects a count of %s", (count) => {
    expect(() => generateInstallmentPlan(1000, count, "2024-01-10")).toThrow(ValidationError);
  });

  it.each([0, -100, Number.NaN, Number.POSITIVE_INFINITY])("rejects a total of %s", (total) => {
    expect(() => generateInstallmentPlan(total, 10, "2024-01-10")).toThrow(ValidationError);
  });

  it("rejects an invalid first due date", () => {
    expect(() => generateInstallmentPlan(1000, 10, "2024-02-30")).toThrow(
      "Invalid first due date: 2024-02-30",
    );
  });
});
