import { describe, it } from "mocha";
import { expect } from "chai";

import { parseTabsConfig } from "../src/config/tabs.js";
import { NotConfiguredError, NotRestartableError } from "../src/errors.js";
import { resourceKey } from "../src/status/resourceKey.js";
import { TabCatalog } from "../src/tabs/catalog.js";

const catalog = new TabCatalog(
  parseTabsConfig(`
tabs:
  - text: Docs
    iconUrl: /icons/docs.svg
    iframeUrl: https://docs.example.com
  - text: Grafana
    iconUrl: /icons/grafana.svg
    iframeUrl: https://grafana.example.com
    k8s:
      namespace: monitoring
      deployment: grafana
`),
);

describe("tab catalog", () => {
  it("resolves restartable tabs to their deployment", () => {
    const target = catalog.assertRestartable(1);

    expect(target.index).to.equal(1);
    expect(target.key).to.deep.equal(resourceKey("monitoring", "grafana"));
    expect(target.deployment).to.deep.equal({ namespace: "monitoring", deployment: "grafana" });
  });

  it("refuses to restart a tab without Kubernetes metadata", () => {
    expect(() => catalog.assertRestartable(0)).to.throw(NotRestartableError, "tab index 0 is not restartable");
  });

  it("treats negative, fractional and missing indices as not configured", () => {
    for (const index of [-1, 0.5, 2]) {
      expect(() => catalog.getTab(index)).to.throw(NotConfiguredError, `tab index ${index} is out of range`);
    }
  });

  it("gives static tabs a synthetic status key", () => {
    expect(catalog.resourceKeyFor(0)).to.deep.equal(resourceKey("static", "tab-0"));
    expect(catalog.resourceKeyFor(1)).to.deep.equal(resourceKey("monitoring", "grafana"));
  });

  it("projects the public view with restartable flags and null colours", () => {
    expect(catalog.size).to.equal(2);
    expect(catalog.toResponse().tabs.map((tab) => [tab.text, tab.restartable, tab.tabColor])).to.deep.equal([
      ["Docs", false, null],
      ["Grafana", true, null],
    ]);
  });
});
