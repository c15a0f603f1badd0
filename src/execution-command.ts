/**
 * Read-only accessor over a command document.
 *
 * The agent receives one command document per unit of deployment work
 * (install, start, restart during an upgrade, ...). ExecutionCommand
 * answers questions about it through fixed-path getters so callers never
 * index into the raw payload themselves. The `configurations` and
 * `configurationAttributes` blocks are served by {@link ModuleConfigs}.
 *
 * The document is held by reference and never written. Concurrent readers
 * are safe only as long as the caller does not mutate the document while
 * an instance is in use.
 */

import { toBoolean, toInteger, toStringList, toStringValue } from './document/coerce.js';
import type { CoercionResult } from './document/coerce.js';
import { lookupPath } from './document/path-lookup.js';
import type { CommandValue } from './document/types.js';
import { ValueCoercionError } from './errors.js';
import { ModuleConfigs } from './module-configs.js';

/** Component whose host list is published without the `_hosts` suffix. */
const BARE_HOSTS_KEY_COMPONENT = 'oozie_server';

export class ExecutionCommand {
  private readonly _command: CommandValue;
  private readonly _moduleConfigs: ModuleConfigs;

  constructor(command: CommandValue) {
    this._command = command;
    this._moduleConfigs = new ModuleConfigs(this.get('configurations'), this.get('configurationAttributes'));
  }

  /**
   * Generic query by `/`-delimited path. Missing keys, nulls and paths
   * running through non-mappings all yield `defaultValue`.
   */
  get(path: string): CommandValue | undefined;
  get<T>(path: string, defaultValue: T): CommandValue | T;
  get<T>(path: string, defaultValue?: T): CommandValue | T | undefined {
    const result = lookupPath(this._command, path);
    return result.status === 'found' ? result.value : defaultValue;
  }

  getString(path: string): string | null;
  getString(path: string, defaultValue: string): string;
  getString(path: string, defaultValue: string | null = null): string | null {
    return this._coerce(path, toStringValue, defaultValue);
  }

  getBool(path: string): boolean | null;
  getBool(path: string, defaultValue: boolean): boolean;
  getBool(path: string, defaultValue: boolean | null = null): boolean | null {
    return this._coerce(path, toBoolean, defaultValue);
  }

  getStringList(path: string, defaultValue: string[] = []): string[] {
    return this._coerce(path, toStringList, defaultValue);
  }

  /**
   * Read an integer. Without a default, a present value that is not an
   * integer throws {@link ValueCoercionError}; with one, it is treated as
   * absent.
   */
  getInt(path: string): number | null;
  getInt(path: string, defaultValue: number): number;
  getInt(path: string, defaultValue?: number): number | null {
    const result = lookupPath(this._command, path);
    if (result.status === 'absent') {
      return defaultValue ?? null;
    }
    const coerced = toInteger(result.value);
    if (coerced.status === 'found') {
      return coerced.value;
    }
    if (defaultValue === undefined) {
      throw new ValueCoercionError(path, 'integer', coerced.actual);
    }
    return defaultValue;
  }

  private _coerce<T, D extends T | null>(
    path: string,
    coerce: (value: CommandValue) => CoercionResult<T>,
    defaultValue: D,
  ): T | D {
    const result = lookupPath(this._command, path);
    if (result.status === 'absent') {
      return defaultValue;
    }
    const coerced = coerce(result.value);
    return coerced.status === 'found' ? coerced.value : defaultValue;
  }

  // Command

  getModuleConfigs(): ModuleConfigs {
    return this._moduleConfigs;
  }

  /** Service name, e.g. `zookeeper` or `hdfs`. */
  getModuleName(): string | null {
    return this.getString('serviceName');
  }

  /** Host role, e.g. `ZOOKEEPER_SERVER`. */
  getComponentType(): string | null {
    return this.getString('role');
  }

  /** Component instances are not named yet; every command targets `default`. */
  getComponentInstanceName(): string {
    return 'default';
  }

  getServicegroupName(): string | null {
    return this.getString('serviceGroupName');
  }

  getClusterName(): string | null {
    return this.getString('clusterName');
  }

  getRepositoryFile(): CommandValue | undefined {
    return this.get('repositoryFile');
  }

  getLocalComponents(): string[] {
    return this.getStringList('localComponents');
  }

  // Server-level parameters

  getJdkLocation(): string | null {
    return this.getString('ambariLevelParams/jdk_location');
  }

  getJdkName(): string | null {
    return this.getString('ambariLevelParams/jdk_name');
  }

  getJavaHome(): string | null {
    return this.getString('ambariLevelParams/java_home');
  }

  /** Major Java version; `"8"` in the document reads as `8`. */
  getJavaVersion(): number | null {
    return this.getInt('ambariLevelParams/java_version');
  }

  getJceName(): string | null {
    return this.getString('ambariLevelParams/jce_name');
  }

  getDbDriverFileName(): string | null {
    return this.getString('ambariLevelParams/db_driver_filename');
  }

  getDbName(): string | null {
    return this.getString('ambariLevelParams/db_name');
  }

  getOracleJdbcUrl(): string | null {
    return this.getString('ambariLevelParams/oracle_jdbc_url');
  }

  getMysqlJdbcUrl(): string | null {
    return this.getString('ambariLevelParams/mysql_jdbc_url');
  }

  getAgentStackRetryCount(): number {
    return this.getInt('ambariLevelParams/agent_stack_retry_count', 5);
  }

  checkAgentStackWantRetryOnUnavailability(): boolean | null {
    return this.getBool('ambariLevelParams/agent_stack_retry_on_unavailability');
  }

  getAmbariServerHost(): string | null {
    return this.getString('ambariLevelParams/ambari_server_host');
  }

  getAmbariServerPort(): string | null {
    return this.getString('ambariLevelParams/ambari_server_port');
  }

  isAmbariServerUseSsl(): boolean {
    return this.getBool('ambariLevelParams/ambari_server_use_ssl', false);
  }

  /** Global flag for hosts whose packages were installed ahead of time. */
  isHostSystemPrepared(): boolean {
    return this.getBool('ambariLevelParams/host_sys_prepped', false);
  }

  isGplLicenseAccepted(): boolean {
    return this.getBool('ambariLevelParams/gpl_license_accepted', false);
  }

  // Stack settings

  getMpackName(): string | null {
    return this.getString('stackSettings/stack_name');
  }

  getMpackVersion(): string | null {
    return this.getString('stackSettings/stack_version');
  }

  getUserGroups(): CommandValue | undefined {
    return this.get('stackSettings/user_groups');
  }

  getGroupList(): CommandValue | undefined {
    return this.get('stackSettings/group_list');
  }

  getUserList(): CommandValue | undefined {
    return this.get('stackSettings/user_list');
  }

  // Agent

  getHostName(): string | null {
    return this.getString('agentLevelParams/hostname');
  }

  checkAgentConfigExecuteInParallel(): number {
    return this.getInt('agentConfigParams/agent/parallel_execution', 0);
  }

  getAgentCacheDir(): string | null {
    return this.getString('agentLevelParams/agentCacheDir');
  }

  // Host

  getRepoInfo(): CommandValue | undefined {
    return this.get('hostLevelParams/repoInfo');
  }

  getServiceRepoInfo(): CommandValue | undefined {
    return this.get('hostLevelParams/service_repo_info');
  }

  // Component

  checkUnlimitedKeyJceRequired(): boolean {
    return this.getBool('componentLevelParams/unlimited_key_jce_required', false);
  }

  // Command parameters

  /** Target stack version during the restart phase of a rolling upgrade. */
  getNewMpackVersionForUpgrade(): string | null {
    return this.getString('commandParams/version');
  }

  checkCommandRetryEnabled(): boolean {
    return this.getBool('commandParams/command_retry_enabled', false);
  }

  checkUpgradeDirection(): string | null {
    return this.getString('commandParams/upgrade_direction');
  }

  getUpgradeType(): string {
    return this.getString('commandParams/upgrade_type', '');
  }

  isRollingRestartInUpgrade(): boolean {
    return this.getBool('commandParams/rolling_restart', false);
  }

  isUpdateFilesOnly(): boolean {
    return this.getBool('commandParams/update_files_only', false);
  }

  getDeployPhase(): string | null {
    return this.getString('commandParams/phase');
  }

  getDfsType(): string | null {
    return this.getString('commandParams/dfs_type');
  }

  getModulePackageFolder(): string | null {
    return this.getString('commandParams/service_package_folder');
  }

  getAmbariJavaHome(): string | null {
    return this.getString('commandParams/ambari_java_home');
  }

  getAmbariJavaName(): string | null {
    return this.getString('commandParams/ambari_java_name');
  }

  getAmbariJceName(): string | null {
    return this.getString('commandParams/ambari_jce_name');
  }

  getAmbariJdkName(): string | null {
    return this.getString('commandParams/ambari_jdk_name');
  }

  needRefreshTopology(): boolean {
    return this.getBool('commandParams/refresh_topology', false);
  }

  checkOnlyUpdateFiles(): boolean {
    return this.getBool('commandParams/update_files_only', false);
  }

  /**
   * Role (`active` or `standby`) chosen by the server for this NameNode.
   * Only sent during a non-rolling upgrade of an HA cluster.
   */
  getDesiredNamenodeRole(): string | null {
    return this.getString('commandParams/desired_namenode_role');
  }

  /** Host of the `active` or `standby` node, read from `commandParams/<type>node`. */
  getNode(type: string): string | null {
    return this.getString(`commandParams/${type}node`);
  }

  // Role parameters

  isUpgradeSuspended(): boolean {
    return this.getBool('roleParams/upgrade_suspended', false);
  }

  // Cluster host info

  getComponentHosts(componentName: string): string[] {
    const key =
      componentName === BARE_HOSTS_KEY_COMPONENT
        ? `clusterHostInfo/${componentName}`
        : `clusterHostInfo/${componentName}_hosts`;
    return this.getStringList(key);
  }

  getComponentHost(componentName: string): string[] {
    return this.getStringList(`clusterHostInfo/${componentName}_host`);
  }

  getAllHosts(): string[] {
    return this.getStringList('clusterHostInfo/all_hosts');
  }

  getAllRacks(): string[] {
    return this.getStringList('clusterHostInfo/all_racks');
  }

  getAllIpv4Ips(): string[] {
    return this.getStringList('clusterHostInfo/all_ipv4_ips');
  }
}
