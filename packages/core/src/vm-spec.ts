import { z } from "zod";
import { Provider, VMType } from "./provider";
import {
  DEFAULT_FIREWALL_RULES,
  DEFAULT_KEY_PAIR_NAME,
  DEFAULT_STORAGE_IOPS,
} from "./constants/defaults";
import { ValidationError } from "./errors";

// Provider-agnostic configuration records. Each carries a shared core plus a
// sparse set of provider fields; only the selected provider's subset is set.

export const VirtualMachineConfigSchema = z.object({
  provider: Provider,
  vcpus: z.number().int().positive(),
  memoryGb: z.number().int().positive(),
  memoryOptimization: z.boolean().default(false),
  diskOptimization: z.boolean().default(false),
  keyPairName: z.string().min(1).default(DEFAULT_KEY_PAIR_NAME),

  // AWS
  instanceType: z.string().optional(),
  region: z.string().optional(),
  ami: z.string().optional(),
  // Azure
  size: z.string().optional(),
  resourceGroup: z.string().optional(),
  image: z.string().optional(),
  // GCP
  machineType: z.string().optional(),
  zone: z.string().optional(),
  project: z.string().optional(),
  // On-premise
  cpu: z.number().int().positive().optional(),
  ram: z.number().int().positive().optional(),
  hypervisor: z.string().optional(),
});

export type VirtualMachineConfig = z.infer<typeof VirtualMachineConfigSchema>;
export type VirtualMachineConfigInput = z.input<typeof VirtualMachineConfigSchema>;

export const NetworkConfigSchema = z.object({
  region: z.string().min(1),
  firewallRules: z.array(z.string()).default(() => [...DEFAULT_FIREWALL_RULES]),
  publicIp: z.boolean().default(true),

  // AWS
  vpcId: z.string().optional(),
  subnet: z.string().optional(),
  securityGroup: z.string().optional(),
  // Azure
  virtualNetwork: z.string().optional(),
  subnetName: z.string().optional(),
  networkSecurityGroup: z.string().optional(),
  // GCP
  networkName: z.string().optional(),
  subnetworkName: z.string().optional(),
  firewallTag: z.string().optional(),
  // On-premise
  physicalInterface: z.string().optional(),
  vlanId: z.number().int().optional(),
  firewallPolicy: z.string().optional(),
});

export type NetworkConfig = z.infer<typeof NetworkConfigSchema>;
export type NetworkConfigInput = z.input<typeof NetworkConfigSchema>;

export const StorageConfigSchema = z.object({
  region: z.string().min(1),
  sizeGb: z.number().int().positive(),
  iops: z.number().int().positive().default(DEFAULT_STORAGE_IOPS),

  // AWS
  volumeType: z.string().optional(),
  encrypted: z.boolean().default(true),
  // Azure
  diskSku: z.string().optional(),
  managedDisk: z.boolean().default(true),
  // GCP
  diskType: z.string().optional(),
  autoDelete: z.boolean().default(true),
  // On-premise
  storagePool: z.string().optional(),
  raidLevel: z.string().optional(),
});

export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type StorageConfigInput = z.input<typeof StorageConfigSchema>;

export const VMSpecificationSchema = z.object({
  vmType: VMType,
  provider: Provider,
  region: z.string().min(1),
  vmConfig: VirtualMachineConfigSchema,
  networkConfig: NetworkConfigSchema,
  storageConfig: StorageConfigSchema,
});

export type VMSpecification = z.infer<typeof VMSpecificationSchema>;
export type VMSpecificationInput = z.input<typeof VMSpecificationSchema>;

/** Keys an override map may set on each config section. */
export const VM_CONFIG_FIELDS: readonly string[] = Object.keys(VirtualMachineConfigSchema.shape);
export const NETWORK_CONFIG_FIELDS: readonly string[] = Object.keys(NetworkConfigSchema.shape);
export const STORAGE_CONFIG_FIELDS: readonly string[] = Object.keys(StorageConfigSchema.shape);

/**
 * Loose key/value map used for overrides, customizations and raw provider
 * parameters.
 */
export const ConfigOverridesSchema = z.record(z.unknown());
export type ConfigOverrides = z.infer<typeof ConfigOverridesSchema>;

// ---------------------------------------------------------------------------
// Value copies
// ---------------------------------------------------------------------------

export function copyVirtualMachineConfig(config: VirtualMachineConfig): VirtualMachineConfig {
  return {
    provider: config.provider,
    vcpus: config.vcpus,
    memoryGb: config.memoryGb,
    memoryOptimization: config.memoryOptimization,
    diskOptimization: config.diskOptimization,
    keyPairName: config.keyPairName,
    instanceType: config.instanceType,
    region: config.region,
    ami: config.ami,
    size: config.size,
    resourceGroup: config.resourceGroup,
    image: config.image,
    machineType: config.machineType,
    zone: config.zone,
    project: config.project,
    cpu: config.cpu,
    ram: config.ram,
    hypervisor: config.hypervisor,
  };
}

export function copyNetworkConfig(config: NetworkConfig): NetworkConfig {
  return {
    region: config.region,
    firewallRules: [...config.firewallRules],
    publicIp: config.publicIp,
    vpcId: config.vpcId,
    subnet: config.subnet,
    securityGroup: config.securityGroup,
    virtualNetwork: config.virtualNetwork,
    subnetName: config.subnetName,
    networkSecurityGroup: config.networkSecurityGroup,
    networkName: config.networkName,
    subnetworkName: config.subnetworkName,
    firewallTag: config.firewallTag,
    physicalInterface: config.physicalInterface,
    vlanId: config.vlanId,
    firewallPolicy: config.firewallPolicy,
  };
}

export function copyStorageConfig(config: StorageConfig): StorageConfig {
  return {
    region: config.region,
    sizeGb: config.sizeGb,
    iops: config.iops,
    volumeType: config.volumeType,
    encrypted: config.encrypted,
    diskSku: config.diskSku,
    managedDisk: config.managedDisk,
    diskType: config.diskType,
    autoDelete: config.autoDelete,
    storagePool: config.storagePool,
    raidLevel: config.raidLevel,
  };
}

export function copySpecification(spec: VMSpecification): VMSpecification {
  return {
    vmType: spec.vmType,
    provider: spec.provider,
    region: spec.region,
    vmConfig: copyVirtualMachineConfig(spec.vmConfig),
    networkConfig: copyNetworkConfig(spec.networkConfig),
    storageConfig: copyStorageConfig(spec.storageConfig),
  };
}

/**
 * Lists the ways a specification's nested configs disagree with its
 * top-level provider and region. Empty when consistent.
 */
export function checkSpecificationConsistency(spec: VMSpecification): string[] {
  const issues: string[] = [];
  if (spec.vmConfig.provider !== spec.provider) {
    issues.push(
      `VM config provider '${spec.vmConfig.provider}' does not match specification provider '${spec.provider}'`
    );
  }
  if (spec.networkConfig.region !== spec.region) {
    issues.push(
      `Network region '${spec.networkConfig.region}' does not match specification region '${spec.region}'`
    );
  }
  if (spec.storageConfig.region !== spec.region) {
    issues.push(
      `Storage region '${spec.storageConfig.region}' does not match specification region '${spec.region}'`
    );
  }
  return issues;
}

// Validation helpers

/** One line per issue, prefixed with the offending field path. */
export function formatSchemaError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

// Override merges: only fields known to the section's schema are applied,
// unknown keys are dropped, and the result is re-validated.

function mergeSection<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  section: string,
  base: T,
  overrides: ConfigOverrides
): T {
  const parsed = schema.safeParse({ ...base, ...overrides });
  if (!parsed.success) {
    throw new ValidationError(`Invalid ${section} configuration: ${formatSchemaError(parsed.error)}`);
  }
  return parsed.data;
}

export function mergeVirtualMachineConfig(
  base: VirtualMachineConfig,
  overrides: ConfigOverrides
): VirtualMachineConfig {
  return mergeSection(VirtualMachineConfigSchema, "VM", copyVirtualMachineConfig(base), overrides);
}

export function mergeNetworkConfig(base: NetworkConfig, overrides: ConfigOverrides): NetworkConfig {
  return mergeSection(NetworkConfigSchema, "network", copyNetworkConfig(base), overrides);
}

export function mergeStorageConfig(base: StorageConfig, overrides: ConfigOverrides): StorageConfig {
  return mergeSection(StorageConfigSchema, "storage", copyStorageConfig(base), overrides);
}

export function validateSpecification(data: unknown): VMSpecification {
  return VMSpecificationSchema.parse(data);
}
