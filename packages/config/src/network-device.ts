/**
 * Network devices of a guest, read from its resource definition
 *
 * Only the `netN:` lines of the current configuration are considered;
 * everything after the first `[snapshot]` section is ignored.
 */

import { Result } from "better-result";
import { ParseError } from "@fwsync/errors";
import { Cidr } from "./address";
import { MacAddress } from "./mac";
import { parseBool } from "./parse";

export const NETWORK_DEVICE_MODELS = ["virtio", "e1000", "rtl8139", "vmxnet3", "veth"] as const;

export type NetworkDeviceModel = (typeof NETWORK_DEVICE_MODELS)[number];

export const MAX_NETWORK_DEVICES = 31;

export interface NetworkDevice {
  model: NetworkDeviceModel;
  mac: MacAddress;
  firewall: boolean;
  ip?: Cidr;
  ip6?: Cidr;
}

function isModel(value: string): value is NetworkDeviceModel {
  return NETWORK_DEVICE_MODELS.some((model) => model === value);
}

/**
 * `netN` to N, for 0 <= N < 31
 */
export function indexFromNetKey(key: string): number | undefined {
  const match = /^net(\d+)$/.exec(key);
  if (!match) {
    return undefined;
  }
  const index = Number(match[1]);
  return index < MAX_NETWORK_DEVICES ? index : undefined;
}

export function parseNetworkDevice(text: string): Result<NetworkDevice, ParseError> {
  let model: NetworkDeviceModel | undefined;
  let mac: MacAddress | undefined;
  let firewall = true;
  let ip: Cidr | undefined;
  let ip6: Cidr | undefined;

  for (const property of text.split(",")) {
    const index = property.indexOf("=");
    if (index === -1) {
      continue;
    }
    const key = property.slice(0, index).trim();
    const value = property.slice(index + 1).trim();

    switch (key) {
      case "model":
      case "type": {
        if (!isModel(value)) {
          return Result.err(new ParseError({ message: `invalid network device model: ${value}`, input: text }));
        }
        model = value;
        break;
      }
      case "macaddr":
      case "hwaddr": {
        const parsed = MacAddress.parse(value);
        if (parsed.isErr()) {
          return Result.err(parsed.error);
        }
        mac = parsed.unwrap();
        break;
      }
      case "firewall": {
        const parsed = parseBool(value);
        if (parsed.isErr()) {
          return Result.err(parsed.error);
        }
        firewall = parsed.unwrap();
        break;
      }
      case "ip": {
        if (value === "dhcp") {
          break;
        }
        const parsed = Cidr.parseV4(value);
        if (parsed.isErr()) {
          return Result.err(parsed.error);
        }
        ip = parsed.unwrap();
        break;
      }
      case "ip6": {
        if (value === "dhcp" || value === "auto") {
          break;
        }
        const parsed = Cidr.parseV6(value);
        if (parsed.isErr()) {
          return Result.err(parsed.error);
        }
        ip6 = parsed.unwrap();
        break;
      }
      default: {
        // `virtio=AA:BB:...` sets model and MAC at once
        if (isModel(key)) {
          const parsed = MacAddress.parse(value);
          if (parsed.isErr()) {
            return Result.err(parsed.error);
          }
          model = key;
          mac = parsed.unwrap();
        }
      }
    }
  }

  if (!model || !mac) {
    return Result.err(
      new ParseError({ message: `no valid network device detected in "${text}"`, input: text })
    );
  }

  return Result.ok({ model, mac, firewall, ip, ip6 });
}

/**
 * Collect the network devices of a guest definition, keyed by index
 */
export function parseNetworkConfig(text: string): Result<Map<number, NetworkDevice>, ParseError> {
  const devices = new Map<number, NetworkDevice>();

  for (const raw of text.split("\n")) {
    const line = raw.trim();

    if (line === "" || line.startsWith("#")) {
      continue;
    }

    if (line.startsWith("[")) {
      break;
    }

    if (!line.startsWith("net")) {
      continue;
    }

    const colon = line.indexOf(":");
    if (colon === -1) {
      continue;
    }

    const key = line.slice(0, colon).trim();
    const value = line.slice(colon + 1).trim();
    if (key === "" || value === "") {
      continue;
    }

    const index = indexFromNetKey(key);
    if (index === undefined) {
      return Result.err(new ParseError({ message: `invalid net key in guest config: ${key}`, input: line }));
    }

    if (devices.has(index)) {
      return Result.err(new ParseError({ message: `duplicate config key: ${key}`, input: line }));
    }

    const device = parseNetworkDevice(value);
    if (device.isErr()) {
      return Result.err(device.error);
    }
    devices.set(index, device.unwrap());
  }

  return Result.ok(devices);
}
