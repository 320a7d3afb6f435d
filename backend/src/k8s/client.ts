import { KubeConfig, CoreV1Api, NetworkingV1Api } from "@kubernetes/client-node";
import { KubeApiClients } from "../cluster/kubeApiControlPlane";

export interface K8sClients extends KubeApiClients {
  core: CoreV1Api;
  networking: NetworkingV1Api;
}

/** In-cluster service account when running as a pod, otherwise ~/.kube/config. */
export function loadKubeConfig(env: NodeJS.ProcessEnv = process.env): KubeConfig {
  const kc = new KubeConfig();
  if (env.KUBERNETES_SERVICE_HOST) {
    kc.loadFromCluster();
  } else {
    kc.loadFromDefault();
  }
  return kc;
}

let cachedClients: K8sClients | null = null;

// Only the API cluster backend calls this; the kubectl backend never loads a kubeconfig.
export function getK8sClients(): K8sClients {
  if (!cachedClients) {
    const kc = loadKubeConfig();
    cachedClients = {
      core: kc.makeApiClient(CoreV1Api),
      networking: kc.makeApiClient(NetworkingV1Api)
    };
  }
  return cachedClients;
}
