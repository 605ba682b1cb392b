import { describe, expect, it } from "vitest";

import { MINIMAL_MODEL_XML } from "../../engine/__tests__/fakes.js";
import {
  checkXmlCompleteness,
  extractStopTime,
  getAnalysisTemplate,
  looksLikeModelXml,
  sanitizeModelXml
} from "../xml-checks.js";

describe("sanitizeModelXml", () => {
  it("strips markdown fences", () => {
    expect(sanitizeModelXml("```xml\n<MorpheusModel version=\"4\"></MorpheusModel>\n```")).toBe(
      '<MorpheusModel version="4"></MorpheusModel>'
    );
  });
});

describe("checkXmlCompleteness", () => {
  it("accepts a model with every output section", () => {
    const check = checkXmlCompleteness(MINIMAL_MODEL_XML);
    expect(check.valid).toBe(true);
    expect(check.errors).toEqual([]);
    expect(check.warnings).toEqual([]);
    expect(check.graph_generation_ready).toBe(true);
    expect(check.sections).toEqual({
      Space: true,
      Time: true,
      CellTypes: true,
      Analysis: true,
      Gnuplotter: true,
      Logger: true,
      ModelGraph: true
    });
  });

  it("rejects a model without an Analysis section", () => {
    const xml = '<MorpheusModel version="4"><Space></Space></MorpheusModel>';
    const check = checkXmlCompleteness(xml);
    expect(check.valid).toBe(false);
    expect(check.errors).toEqual([
      "Missing <Analysis> section: no outputs will be generated",
      "Include <Analysis> with <Gnuplotter> and <Logger> to generate graphs",
      "Models without a <Gnuplotter> section do not generate PNG graphs"
    ]);
  });

  it("stops at a missing root element", () => {
    expect(checkXmlCompleteness("<Model/>").errors).toEqual(["Missing <MorpheusModel> root element"]);
  });

  it("warns when Gnuplotter declares no plots", () => {
    const xml = MINIMAL_MODEL_XML.replace('<Plot><Cells value="cell.type"/></Plot>', "");
    const check = checkXmlCompleteness(xml);
    expect(check.valid).toBe(true);
    expect(check.graph_generation_ready).toBe(false);
    expect(check.warnings).toEqual(["Gnuplotter found but no <Plot> elements: no graphs will be generated"]);
  });
});

describe("extractStopTime", () => {
  it("reads the value attribute and the element text", () => {
    expect(extractStopTime('<Time><StopTime value="250.5"/></Time>')).toBe(250.5);
    expect(extractStopTime("<StopTime symbol=\"stop\">1e3</StopTime>")).toBe(1000);
    expect(extractStopTime("<Time/>")).toBeNull();
  });
});

describe("model templates", () => {
  it("ships an analysis template the checker recognizes", () => {
    const template = getAnalysisTemplate();
    expect(template).toContain("<Gnuplotter");
    expect(template).toContain("<Logger");
    expect(looksLikeModelXml(MINIMAL_MODEL_XML)).toBe(true);
    expect(looksLikeModelXml(template)).toBe(false);
  });
});
