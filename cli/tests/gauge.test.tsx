import React from "react";
import { describe, test, expect } from "vitest";
import { render } from "ink-testing-library";
import Gauge, { gaugeColor } from "../src/components/Gauge";
import { plain } from "./fixtures";

describe("Gauge", () => {
  test("colours by level", () => {
    const levels = { warn: 60, alert: 80 };

    expect(gaugeColor(60, levels)).toBe("green");
    expect(gaugeColor(60.1, levels)).toBe("yellow");
    expect(gaugeColor(80.5, levels)).toBe("red");
  });

  test("draws a clamped bar with its percentage", () => {
    const { lastFrame, unmount } = render(<Gauge label="usage" value={42.5} width={10} />);

    expect(plain(lastFrame())).toBe("usage ████░░░░░░ 42.5%");
    unmount();
  });

  test("clamps values outside 0 to 100", () => {
    const { lastFrame, unmount } = render(<Gauge value={130} width={4} />);

    expect(plain(lastFrame())).toBe("████ 100.0%");
    unmount();
  });
});
