import { describe, expect, it } from "vitest";
import { extend_number_array, sorted_insert, trim_trailing } from "../arrays";

describe("extend_number_array", () => {
  it("pads with the fill value up to min_length", () => {
    const arr = [1, 2];
    extend_number_array(arr, 5, -1);
    expect(arr).toEqual([1, 2, -1, -1, -1]);
  });

  it("leaves a long enough array untouched", () => {
    const arr = [1, 2, 3];
    extend_number_array(arr, 2, 0);
    expect(arr).toEqual([1, 2, 3]);
  });
});

describe("trim_trailing", () => {
  it("pops only the trailing run of the value", () => {
    const arr = [-1, 4, -1, -1];
    expect(trim_trailing(arr, -1)).toBe(2);
    expect(arr).toEqual([-1, 4]);
  });

  it("can empty the array", () => {
    const arr = [-1, -1];
    expect(trim_trailing(arr, -1)).toBe(2);
    expect(arr).toEqual([]);
    expect(trim_trailing(arr, -1)).toBe(0);
  });
});

describe("sorted_insert", () => {
  const by_first = (a: [number, string], b: [number, string]) => a[0] - b[0];

  it("keeps the array sorted and returns the insert index", () => {
    const arr: [number, string][] = [];
    expect(sorted_insert(arr, [5, "a"], by_first)).toBe(0);
    expect(sorted_insert(arr, [1, "b"], by_first)).toBe(0);
    expect(sorted_insert(arr, [9, "c"], by_first)).toBe(2);
    expect(sorted_insert(arr, [6, "d"], by_first)).toBe(2);
    expect(arr.map((e) => e[1])).toEqual(["b", "a", "d", "c"]);
  });

  it("places equal keys after existing ones", () => {
    const arr: [number, string][] = [
      [1, "first"],
      [2, "second"],
    ];
    sorted_insert(arr, [1, "third"], by_first);
    expect(arr.map((e) => e[1])).toEqual(["first", "third", "second"]);
  });
});
