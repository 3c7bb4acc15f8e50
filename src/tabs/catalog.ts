import type { KubernetesTarget, TabConfig, TabsConfig } from "../config/tabs.js";
import type { DeploymentRef } from "../orchestration/client.js";
import { NotConfiguredError, NotRestartableError } from "../errors.js";
import { STATIC_NAMESPACE, resourceKey, type ResourceKey } from "../status/resourceKey.js";

/** Public projection of one tab returned by `GET /api/config`. */
export interface TabResponse {
  text: string;
  iconUrl: string;
  iframeUrl: string;
  restartable: boolean;
  tabColor: string | null;
}

export interface ConfigResponse {
  tabs: TabResponse[];
}

/** A tab that carries Kubernetes metadata and can therefore be restarted. */
export interface RestartableTab {
  readonly index: number;
  readonly tab: TabConfig;
  readonly key: ResourceKey;
  readonly deployment: DeploymentRef;
}

/**
 * Immutable view over the configured tabs. Indices are positional and
 * zero-based; negative or fractional indices are never valid.
 */
export class TabCatalog {
  private readonly tabs: readonly TabConfig[];

  constructor(config: TabsConfig) {
    this.tabs = Object.freeze(config.tabs.map((tab) => Object.freeze({ ...tab })));
  }

  get size(): number {
    return this.tabs.length;
  }

  getTab(index: number): TabConfig {
    const tab = Number.isInteger(index) && index >= 0 ? this.tabs[index] : undefined;
    if (!tab) {
      throw new NotConfiguredError(index);
    }
    return tab;
  }

  assertRestartable(index: number): RestartableTab {
    const tab = this.getTab(index);
    if (!tab.k8s) {
      throw new NotRestartableError(index);
    }
    return { index, tab, key: kubernetesKey(tab.k8s), deployment: toDeploymentRef(tab.k8s) };
  }

  /**
   * Status channel key of the tab. Tabs without Kubernetes metadata get a
   * synthetic key in the static namespace so they still have a stream.
   */
  resourceKeyFor(index: number): ResourceKey {
    const tab = this.getTab(index);
    return tab.k8s ? kubernetesKey(tab.k8s) : resourceKey(STATIC_NAMESPACE, `tab-${index}`);
  }

  toResponse(): ConfigResponse {
    return {
      tabs: this.tabs.map((tab) => ({
        text: tab.text,
        iconUrl: tab.iconUrl,
        iframeUrl: tab.iframeUrl,
        restartable: tab.k8s !== null,
        tabColor: tab.tabColor,
      })),
    };
  }
}

function kubernetesKey(target: KubernetesTarget): ResourceKey {
  return resourceKey(target.namespace, target.deployment);
}

function toDeploymentRef(target: KubernetesTarget): DeploymentRef {
  return { namespace: target.namespace, deployment: target.deployment };
}
