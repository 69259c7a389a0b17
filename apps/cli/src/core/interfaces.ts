import { existsSync, lstatSync, readdirSync, readFileSync, statSync } from "fs";
import { networkInterfaces, type NetworkInterfaceInfo } from "os";
import { join } from "path";
import type { InterfaceRecord } from "@cvslurm/shared";
import {
  DEFAULT_INTERFACE_PREFIXES,
  IGNORED_IPV4,
  INVALID_MAC,
  SKIPPED_INTERFACES,
  SYSFS_NET_PATH,
  VIRTUAL_INTERFACE_PREFIXES,
} from "@/lib/constants.ts";
import { errorMessage } from "@/lib/errors.ts";
import type { Logger } from "@/lib/logger.ts";

export type AddressTable = () => NodeJS.Dict<NetworkInterfaceInfo[]>;

export interface InterfaceScanOptions {
  logger: Logger;
  /** Regex interface names must match; empty means the default prefixes. */
  nameRegex?: string;
  sysfsRoot?: string;
  addresses?: AddressTable;
}

export function buildNameMatcher(
  pattern: string | undefined,
  logger: Logger,
): (name: string) => boolean {
  const byPrefix = (name: string) =>
    DEFAULT_INTERFACE_PREFIXES.some((prefix) => name.startsWith(prefix));
  if (!pattern) return byPrefix;

  try {
    const regex = new RegExp(pattern);
    return (name) => regex.test(name);
  } catch (error) {
    logger.warn(
      `Invalid IFACE_NAME_REGEX '${pattern}': ${errorMessage(error)}; falling back to default interface prefixes`,
    );
    return byPrefix;
  }
}

function readSysfs(root: string, iface: string, attr: string): string | null {
  const path = join(root, iface, attr);
  if (!existsSync(path)) return null;
  return readFileSync(path, "utf-8").trim();
}

/** Physical NICs have a `device` symlink to their PCI device; virtual ones do not. */
function isPhysical(root: string, iface: string): boolean {
  try {
    return lstatSync(join(root, iface, "device")).isSymbolicLink();
  } catch {
    return false;
  }
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

function readMac(root: string, iface: string, logger: Logger): string | null {
  try {
    const mac = readSysfs(root, iface, "address")?.toLowerCase();
    return mac && mac !== INVALID_MAC ? mac : null;
  } catch (error) {
    logger.debug(`Failed to read MAC for ${iface}: ${errorMessage(error)}`);
    return null;
  }
}

function readIPv4(
  root: string,
  iface: string,
  addresses: AddressTable,
  logger: Logger,
): string[] {
  let operstate: string | null;
  try {
    operstate = readSysfs(root, iface, "operstate");
  } catch (error) {
    logger.debug(`Failed to read operstate for ${iface}: ${errorMessage(error)}`);
    operstate = null;
  }
  if (operstate !== null && operstate !== "up") {
    logger.debug(`Interface ${iface} is not up (state: ${operstate})`);
    return [];
  }

  const ips = (addresses()[iface] ?? [])
    .filter((info) => info.family === "IPv4" && !IGNORED_IPV4.has(info.address))
    .map((info) => info.address);

  if (ips.length === 0) logger.debug(`No IP address found for ${iface}`);
  else logger.debug(`Found IP ${ips.join(", ")} for interface ${iface}`);
  return ips;
}

/**
 * List this host's physical, named-as-configured network interfaces with
 * their MAC and IPv4 addresses, sorted by name.
 */
export function discoverInterfaces(options: InterfaceScanOptions): InterfaceRecord[] {
  const { logger } = options;
  const root = options.sysfsRoot ?? SYSFS_NET_PATH;
  const addresses = options.addresses ?? networkInterfaces;
  const matches = buildNameMatcher(options.nameRegex, logger);

  let entries: string[];
  try {
    entries = readdirSync(root).sort();
  } catch (error) {
    logger.error(`Failed to discover network interfaces: ${errorMessage(error)}`);
    return [];
  }

  const interfaces: InterfaceRecord[] = [];
  for (const name of entries) {
    if (!isDirectory(join(root, name))) continue;

    // Skip loopback and known virtual interfaces
    if (
      SKIPPED_INTERFACES.has(name) ||
      VIRTUAL_INTERFACE_PREFIXES.some((prefix) => name.startsWith(prefix))
    ) {
      continue;
    }

    if (!isPhysical(root, name)) {
      logger.debug(`Skipping ${name} (not a physical interface)`);
      continue;
    }

    if (!matches(name)) {
      logger.debug(`Skipping ${name} (does not match name filter)`);
      continue;
    }

    const mac = readMac(root, name, logger);
    if (!mac) {
      logger.debug(`Skipping ${name} (no MAC address)`);
      continue;
    }

    const ips = readIPv4(root, name, addresses, logger);
    interfaces.push({ name, mac_address: mac, ip_addresses: ips });
    logger.debug(
      `Discovered interface ${name}: MAC=${mac}, IP=${ips.join(", ") || "none"}`,
    );
  }

  return interfaces;
}
