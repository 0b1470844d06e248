import * as k8s from '@kubernetes/client-node';
import { isNotFound } from './errors.js';

/**
 * The three calls the scaler makes against the API server. Matches the Role the
 * chart grants: deployments get/create/patch and deployments/scale patch.
 */
export interface DeploymentClient {
  /** Resolves to null when the Deployment does not exist. */
  get(namespace: string, name: string): Promise<k8s.V1Deployment | null>;
  create(namespace: string, deployment: k8s.V1Deployment): Promise<k8s.V1Deployment>;
  scale(namespace: string, name: string, replicas: number): Promise<void>;
}

export class KubeDeploymentClient implements DeploymentClient {
  private appsApi: k8s.AppsV1Api;

  constructor(kubeConfig: k8s.KubeConfig) {
    this.appsApi = kubeConfig.makeApiClient(k8s.AppsV1Api);
  }

  async get(namespace: string, name: string): Promise<k8s.V1Deployment | null> {
    try {
      return await this.appsApi.readNamespacedDeployment({ name, namespace });
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async create(namespace: string, deployment: k8s.V1Deployment): Promise<k8s.V1Deployment> {
    return this.appsApi.createNamespacedDeployment({ namespace, body: deployment });
  }

  async scale(namespace: string, name: string, replicas: number): Promise<void> {
    // merge patch on the scale subresource touches spec.replicas and nothing else
    await this.appsApi.patchNamespacedDeploymentScale(
      { name, namespace, body: { spec: { replicas } } },
      k8s.setHeaderOptions('Content-Type', k8s.PatchStrategy.MergePatch)
    );
  }
}

/**
 * Load cluster credentials the usual way: in-cluster service account, then KUBECONFIG,
 * then ~/.kube/config. With skipTlsVerify the current clusters stop checking certificates,
 * which is only meant for local development clusters.
 */
export function loadKubeConfig(skipTlsVerify = false): k8s.KubeConfig {
  const kubeConfig = new k8s.KubeConfig();
  kubeConfig.loadFromDefault();

  if (skipTlsVerify) {
    kubeConfig.loadFromOptions({
      clusters: kubeConfig.getClusters().map((cluster) => ({ ...cluster, skipTLSVerify: true })),
      users: kubeConfig.getUsers(),
      contexts: kubeConfig.getContexts(),
      currentContext: kubeConfig.getCurrentContext(),
    });
  }
  return kubeConfig;
}

export function contextNamespace(kubeConfig: k8s.KubeConfig): string | undefined {
  return kubeConfig.getContextObject(kubeConfig.getCurrentContext())?.namespace;
}
