import { MalformedResponseError } from '../errors/streamer-errors.js';
import { asArray, child, isWellFormed, parseXML, textOf } from '../utils/xml.js';
import { SERVICE_URNS, type DeviceDescriptor, type ServiceEndpoint, type ServiceName, type SourceInfo } from '../types/streamer.js';

const SERVICE_NAMES = Object.keys(SERVICE_URNS).filter(isServiceName);

function isServiceName(name: string): name is ServiceName {
  return name in SERVICE_URNS;
}

function parseDocument(xml: string, what: string): unknown {
  if (!xml.trim() || !isWellFormed(xml)) {
    throw new MalformedResponseError('Description', what, `${what} is not well-formed XML`);
  }
  return parseXML(xml);
}

/**
 * Match a serviceType against the names we know, ignoring the version suffix
 */
export function serviceNameFor(serviceType: string): ServiceName | undefined {
  return SERVICE_NAMES.find(name => {
    const urn = SERVICE_URNS[name];
    return serviceType.startsWith(urn.slice(0, urn.lastIndexOf(':') + 1));
  });
}

function resolveUrl(path: string, base: string): string {
  if (!path) {
    return '';
  }
  try {
    return new URL(path, base).toString();
  } catch {
    return path;
  }
}

function collectServices(
  device: unknown,
  base: string,
  found: Partial<Record<ServiceName, ServiceEndpoint>>
): void {
  for (const service of asArray(child(child(device, 'serviceList'), 'service'))) {
    const serviceType = textOf(child(service, 'serviceType')) ?? '';
    const name = serviceNameFor(serviceType);
    if (!name || found[name]) {
      continue;
    }
    found[name] = Object.freeze({
      serviceType,
      serviceId: textOf(child(service, 'serviceId')) ?? '',
      controlUrl: resolveUrl(textOf(child(service, 'controlURL')) ?? '', base),
      eventSubUrl: resolveUrl(textOf(child(service, 'eventSubURL')) ?? '', base),
      scpdUrl: resolveUrl(textOf(child(service, 'SCPDURL')) ?? '', base)
    });
  }

  for (const embedded of asArray(child(child(device, 'deviceList'), 'device'))) {
    collectServices(embedded, base, found);
  }
}

/**
 * Parse a UPnP device description. Services of the root device and of every
 * embedded device are collected; the first match per service name wins.
 */
export function parseDeviceDescription(xml: string, location: string): DeviceDescriptor {
  const root = child(parseDocument(xml, 'Device description'), 'root');
  const device = child(root, 'device');
  if (!device) {
    throw new MalformedResponseError('Description', 'Device description', 'Device description has no <device> element');
  }

  const baseUrl = textOf(child(root, 'URLBase')) || location;
  const services: Partial<Record<ServiceName, ServiceEndpoint>> = {};
  collectServices(device, baseUrl, services);

  return Object.freeze({
    udn: textOf(child(device, 'UDN')) ?? '',
    location,
    baseUrl,
    friendlyName: textOf(child(device, 'friendlyName')) ?? '',
    manufacturer: textOf(child(device, 'manufacturer')) ?? '',
    modelName: textOf(child(device, 'modelName')) ?? '',
    services: Object.freeze(services)
  });
}

/**
 * Names of the actions a service control protocol description declares
 */
export function parseScpdActions(xml: string): Set<string> {
  const scpd = child(parseDocument(xml, 'SCPD'), 'scpd');
  const actions = new Set<string>();
  for (const action of asArray(child(child(scpd, 'actionList'), 'action'))) {
    const name = textOf(child(action, 'name'));
    if (name) {
      actions.add(name);
    }
  }
  return actions;
}

/**
 * Parse the OpenHome Product SourceXml document. Index is the position in the list.
 */
export function parseSourceXml(xml: string): SourceInfo[] {
  const list = child(parseDocument(xml, 'SourceXml'), 'SourceList');
  return asArray(child(list, 'Source')).map((source, index) => ({
    index,
    name: textOf(child(source, 'Name')) ?? `Source ${index}`,
    type: textOf(child(source, 'Type')) ?? '',
    visible: (textOf(child(source, 'Visible')) ?? 'true').toLowerCase() !== 'false'
  }));
}
