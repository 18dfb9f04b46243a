import { ClusterStartFailedError } from "../core/errors.js";
import type { ProgressReporter } from "../core/progress.js";

import type { ClusterControl } from "./ports.js";

export const LOAD_BALANCER_ADDON = "metallb";

export type ProvisionClusterInput = {
  cluster: ClusterControl;
  kubernetesVersion: string;
  profile: string;
  reporter: ProgressReporter;
};

export async function provisionCluster(input: ProvisionClusterInput): Promise<void> {
  const { cluster, kubernetesVersion, profile } = input;

  input.reporter.rule("Starting Minikube cluster");
  await input.reporter.timed(
    {
      stage: "provision-cluster",
      start: "Creating Minikube cluster",
      end: "Created Minikube cluster",
    },
    async () => {
      await cluster.start(kubernetesVersion, profile);
      if (!(await cluster.status(profile))) {
        throw new ClusterStartFailedError(profile);
      }
      await cluster.configureMetallb(profile);
      await cluster.addonsEnable(LOAD_BALANCER_ADDON, profile);
    },
  );
}
