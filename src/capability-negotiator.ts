import logger from './utils/logger.js';
import { debugManager } from './utils/debug-manager.js';
import { getErrorMessage } from './utils/error-helper.js';
import { httpRequest, type HttpResponse } from './utils/http.js';
import { DESCRIPTION_RETRY_OPTIONS, retry, type RetryOptions } from './utils/retry.js';
import { soapRequest } from './utils/soap.js';
import { parseDuration } from './utils/duration.js';
import { parseDeviceDescription, parseScpdActions, parseSourceXml } from './upnp/description.js';
import { IncompatibleDeviceError, NetworkError, TimeoutError } from './errors/streamer-errors.js';
import type {
  CapabilitySet,
  DeviceDescriptor,
  ServiceEndpoint,
  ServiceName,
  SourceInfo
} from './types/streamer.js';

export interface NegotiatorOptions {
  timeoutMs: number;
  subscriptionTimeout: number;
  retryOptions?: RetryOptions;
}

export interface NegotiationResult {
  descriptor: DeviceDescriptor;
  capabilities: CapabilitySet;
}

const REQUIRED_TRANSPORT_ACTIONS = ['Play', 'Pause', 'Stop'];

/**
 * Reads what a streamer can do from its own descriptions. Nothing is assumed
 * from the model name: an action exists only if the service's SCPD lists it.
 */
export class CapabilityNegotiator {
  constructor(private readonly options: NegotiatorOptions) {}

  async negotiate(location: string): Promise<NegotiationResult> {
    const descriptionXml = await this.fetchDocument(location, 'device description');
    const descriptor = parseDeviceDescription(descriptionXml, location);
    debugManager.info('capabilities', `Found ${descriptor.manufacturer} ${descriptor.modelName} '${descriptor.friendlyName}' (${descriptor.udn})`);

    const avTransport = descriptor.services.AVTransport;
    if (!avTransport) {
      throw new IncompatibleDeviceError(location, 'no AVTransport service');
    }

    const actions: Partial<Record<ServiceName, ReadonlySet<string>>> = {
      AVTransport: await this.fetchActions('AVTransport', avTransport)
    };

    const missing = REQUIRED_TRANSPORT_ACTIONS.filter(action => !actions.AVTransport?.has(action));
    if (missing.length > 0) {
      throw new IncompatibleDeviceError(location, `AVTransport lacks ${missing.join(', ')}`);
    }

    for (const name of ['RenderingControl', 'ConnectionManager', 'Product'] as const) {
      const endpoint = descriptor.services[name];
      if (!endpoint) {
        continue;
      }
      try {
        actions[name] = await this.fetchActions(name, endpoint);
      } catch (error) {
        // Optional services degrade to absent
        logger.warn(`Ignoring ${name}: could not read its SCPD: ${getErrorMessage(error)}`);
      }
    }

    const has = (service: ServiceName, action: string): boolean => actions[service]?.has(action) ?? false;

    const hasPosition = has('AVTransport', 'GetPositionInfo') && await this.reportsPosition(avTransport);

    let sources: SourceInfo[] = [];
    let hasSourceList = false;
    const product = descriptor.services.Product;
    if (product && has('Product', 'SourceXml') && has('Product', 'SetSourceIndex')) {
      try {
        sources = await this.fetchSources(product);
        hasSourceList = true;
      } catch (error) {
        logger.warn(`Source list unavailable: ${getErrorMessage(error)}`);
      }
    }

    const capabilities: CapabilitySet = Object.freeze({
      actions: Object.freeze(actions),
      hasVolume: has('RenderingControl', 'SetVolume'),
      hasMute: has('RenderingControl', 'SetMute'),
      hasSourceList,
      hasPosition,
      hasSeek: hasPosition && has('AVTransport', 'Seek'),
      hasPlayMode: has('AVTransport', 'SetPlayMode'),
      sources: Object.freeze(sources),
      subscriptionTimeout: this.options.subscriptionTimeout
    });

    debugManager.info('capabilities', 'Negotiated capabilities', {
      hasVolume: capabilities.hasVolume,
      hasMute: capabilities.hasMute,
      hasSourceList: capabilities.hasSourceList,
      hasPosition: capabilities.hasPosition,
      hasSeek: capabilities.hasSeek,
      hasPlayMode: capabilities.hasPlayMode,
      sources: sources.map(s => s.name)
    });

    return { descriptor, capabilities };
  }

  private async fetchActions(name: ServiceName, endpoint: ServiceEndpoint): Promise<ReadonlySet<string>> {
    const scpd = await this.fetchDocument(endpoint.scpdUrl, `${name} SCPD`);
    const actions = parseScpdActions(scpd);
    debugManager.debug('capabilities', `${name} actions: ${[...actions].join(', ')}`);
    return actions;
  }

  /**
   * A transport that reports a real RelTime can be positioned; one that
   * answers NOT_IMPLEMENTED (or fails) cannot
   */
  private async reportsPosition(endpoint: ServiceEndpoint): Promise<boolean> {
    try {
      const result = await soapRequest(endpoint.controlUrl, endpoint.serviceType, 'GetPositionInfo', { InstanceID: 0 }, {
        service: 'AVTransport',
        timeoutMs: this.options.timeoutMs
      });
      return parseDuration(result['RelTime']) !== undefined;
    } catch (error) {
      debugManager.debug('capabilities', `GetPositionInfo check failed: ${getErrorMessage(error)}`);
      return false;
    }
  }

  private async fetchSources(endpoint: ServiceEndpoint): Promise<SourceInfo[]> {
    const result = await soapRequest(endpoint.controlUrl, endpoint.serviceType, 'SourceXml', {}, {
      service: 'Product',
      timeoutMs: this.options.timeoutMs
    });
    return parseSourceXml(result['Value'] ?? '');
  }

  private async fetchDocument(url: string, what: string): Promise<string> {
    return retry(async () => {
      let response: HttpResponse;
      try {
        response = await httpRequest({ url, timeout: this.options.timeoutMs });
      } catch (error) {
        const message = error instanceof TimeoutError
          ? `Fetching ${what} timed out after ${this.options.timeoutMs}ms`
          : `Fetching ${what} failed: ${getErrorMessage(error)}`;
        throw new NetworkError('Description', 'GET', message, error);
      }
      if (response.statusCode < 200 || response.statusCode >= 300) {
        throw new NetworkError('Description', 'GET', `Fetching ${what} failed: HTTP ${response.statusCode}`);
      }
      return response.body;
    }, this.options.retryOptions ?? DESCRIPTION_RETRY_OPTIONS, `fetch ${what}`);
  }
}
