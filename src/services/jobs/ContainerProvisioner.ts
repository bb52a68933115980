/**
 * ContainerProvisioner
 *
 * Runs one-shot code agent containers. The Azure implementation creates a
 * container group per job; tests use an in-process fake behind the same
 * interface.
 */

import { ContainerGroup, ContainerInstanceManagementClient } from '@azure/arm-containerinstance';
import { ClientSecretCredential, DefaultAzureCredential, TokenCredential } from '@azure/identity';
import { ContainerConfig, requireSetting } from '../../config/AppConfig';
import { Logger } from '../../utils/logger';

export interface ContainerEnvVar {
  name: string;
  value: string;
  /** Secure values are hidden from the container group's properties. */
  secure?: boolean;
}

export interface ContainerSpec {
  name: string;
  image: string;
  env: ContainerEnvVar[];
}

export interface ContainerState {
  state?: string;
  exitCode?: number;
}

export interface ContainerProvisioner {
  create(spec: ContainerSpec): Promise<{ name: string }>;
  getState(name: string): Promise<ContainerState>;
}

function createCredential(config: ContainerConfig): TokenCredential {
  const { tenantId, clientId, clientSecret } = config.servicePrincipal;
  if (tenantId && clientId && clientSecret) {
    return new ClientSecretCredential(tenantId, clientId, clientSecret);
  }
  return new DefaultAzureCredential();
}

export class AzureContainerProvisioner implements ContainerProvisioner {
  private readonly client: ContainerInstanceManagementClient;
  private readonly resourceGroup: string;

  constructor(private readonly config: ContainerConfig) {
    const subscriptionId = requireSetting(config.subscriptionId, 'SUBSCRIPTION_ID');
    this.resourceGroup = requireSetting(config.resourceGroup, 'RESOURCE_GROUP');
    this.client = new ContainerInstanceManagementClient(createCredential(config), subscriptionId);
  }

  async create(spec: ContainerSpec): Promise<{ name: string }> {
    const { registry } = this.config;

    const group: ContainerGroup = {
      location: this.config.location,
      osType: 'Linux',
      restartPolicy: 'Never',
      containers: [
        {
          name: spec.name,
          image: spec.image,
          resources: {
            requests: { cpu: this.config.cpu, memoryInGB: this.config.memoryInGB },
          },
          environmentVariables: spec.env.map((variable) =>
            variable.secure
              ? { name: variable.name, secureValue: variable.value }
              : { name: variable.name, value: variable.value }
          ),
        },
      ],
      ...(registry.server &&
        registry.username &&
        registry.password && {
          imageRegistryCredentials: [
            { server: registry.server, username: registry.username, password: registry.password },
          ],
        }),
    };

    Logger.job(spec.name, 'Creating container group', { image: spec.image, location: this.config.location });
    const created = await this.client.containerGroups.beginCreateOrUpdateAndWait(this.resourceGroup, spec.name, group);
    return { name: created.name ?? spec.name };
  }

  async getState(name: string): Promise<ContainerState> {
    const group = await this.client.containerGroups.get(this.resourceGroup, name);
    const current = group.containers[0]?.instanceView?.currentState;
    return { state: current?.state, exitCode: current?.exitCode };
  }
}
