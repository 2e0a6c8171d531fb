import * as k8s from "@kubernetes/client-node";
import { asErrorMessage, ConfigError } from "./errors";

/**
 * Loads kubeconfig using the standard kubeconfig loading rules:
 * - KUBECONFIG env var
 * - ~/.kube/config
 * - in-cluster service account (if applicable)
 *
 * and checks that the cluster answers before anything else runs.
 */
export async function kubeConnect(): Promise<k8s.KubeConfig> {
  const kc = new k8s.KubeConfig();
  try {
    kc.loadFromDefault();
  } catch (err) {
    throw new ConfigError(`Unable to load kubeconfig: ${asErrorMessage(err)}`);
  }

  try {
    const coreV1 = kc.makeApiClient(k8s.CoreV1Api);
    await coreV1.listNamespace(undefined, undefined, undefined, undefined, undefined, 1);
    return kc;
  } catch (err) {
    throw new ConfigError(
      `Unable to connect to Kubernetes cluster. Please ensure your kubeconfig is valid and accessible (${asErrorMessage(err)})`
    );
  }
}
