import { XMLBuilder } from 'fast-xml-parser';
import logger from './logger.js';
import { debugManager } from './debug-manager.js';
import { getErrorMessage, isAbortError } from './error-helper.js';
import { child, isWellFormed, isXmlNode, parseXML, textOf } from './xml.js';
import { MalformedResponseError, NetworkError, ProtocolFaultError } from '../errors/streamer-errors.js';
import type { ActionResult } from '../types/soap-responses.js';

const xmlBuilder = new XMLBuilder({
  ignoreAttributes: false,
  format: false,
  suppressEmptyNode: false
});

interface SoapEnvelope {
  's:Envelope': {
    '@_xmlns:s': string;
    '@_s:encodingStyle': string;
    's:Body': {
      [key: string]: {
        '@_xmlns:u': string;
        [key: string]: unknown;
      };
    };
  };
}

export type SoapArgs = Record<string, string | number | boolean>;

export interface SoapRequestOptions {
  /** Service name used in errors and logs */
  service: string;
  timeoutMs: number;
}

export function createSoapEnvelope(serviceType: string, action: string, args: SoapArgs = {}): string {
  const body: Record<string, string> = {};
  for (const [name, value] of Object.entries(args)) {
    body[name] = typeof value === 'boolean' ? (value ? '1' : '0') : String(value);
  }

  const envelope: SoapEnvelope = {
    's:Envelope': {
      '@_xmlns:s': 'http://schemas.xmlsoap.org/soap/envelope/',
      '@_s:encodingStyle': 'http://schemas.xmlsoap.org/soap/encoding/',
      's:Body': {
        [`u:${action}`]: {
          '@_xmlns:u': serviceType,
          ...body
        }
      }
    }
  };

  return '<?xml version="1.0" encoding="utf-8"?>' + xmlBuilder.build(envelope);
}

function toActionResult(response: unknown): ActionResult {
  const result: ActionResult = {};
  if (!isXmlNode(response)) {
    // <u:PlayResponse/> parses as an empty string
    return result;
  }
  for (const [name, value] of Object.entries(response)) {
    if (name.startsWith('@_')) {
      continue;
    }
    result[name] = textOf(value) ?? '';
  }
  return result;
}

/**
 * Parse a SOAP response body into the action's output arguments.
 * A Fault becomes ProtocolFaultError, anything that is not an envelope
 * becomes MalformedResponseError.
 */
export function parseSoapResponse(xml: string, service: string, action: string): ActionResult {
  if (!xml.trim() || !isWellFormed(xml)) {
    throw new MalformedResponseError(service, action, `${action}: response is not well-formed XML`);
  }

  let parsed: unknown;
  try {
    parsed = parseXML(xml);
  } catch (error) {
    throw new MalformedResponseError(service, action, `${action}: ${getErrorMessage(error)}`, error);
  }

  const body = child(child(parsed, 'Envelope'), 'Body');
  if (!isXmlNode(body)) {
    throw new MalformedResponseError(service, action, `${action}: no SOAP envelope body in response`);
  }

  const fault = body['Fault'];
  if (fault !== undefined) {
    const upnpError = child(child(fault, 'detail'), 'UPnPError');
    const errorCode = textOf(child(upnpError, 'errorCode'));
    const errorDescription = textOf(child(upnpError, 'errorDescription')) || undefined;
    if (errorCode) {
      throw new ProtocolFaultError(service, action, errorCode, errorDescription);
    }
    const faultString = textOf(child(fault, 'faultstring'));
    throw new ProtocolFaultError(service, action, textOf(child(fault, 'faultcode')) || 'UNKNOWN', faultString || undefined);
  }

  const responseName = Object.keys(body).find(key => !key.startsWith('@_'));
  if (!responseName) {
    throw new MalformedResponseError(service, action, `${action}: empty SOAP body`);
  }

  return toActionResult(body[responseName]);
}

/**
 * POST one SOAP action. Every failure is a TransportError:
 * NETWORK for timeouts, socket errors and non-fault HTTP errors,
 * FAULT for SOAP faults, MALFORMED for unreadable bodies.
 */
export async function soapRequest(
  url: string,
  serviceType: string,
  action: string,
  args: SoapArgs,
  options: SoapRequestOptions
): Promise<ActionResult> {
  const { service, timeoutMs } = options;
  const envelope = createSoapEnvelope(serviceType, action, args);

  debugManager.debug('soap', `SOAP Request to ${url}`, { action, args });

  let response: Response;
  let responseText: string;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'text/xml; charset="utf-8"',
        'SOAPAction': `"${serviceType}#${action}"`
      },
      body: envelope,
      signal: AbortSignal.timeout(timeoutMs)
    });
    responseText = await response.text();
  } catch (error) {
    const message = isAbortError(error)
      ? `${action} timed out after ${timeoutMs}ms`
      : `${action} failed: ${getErrorMessage(error)}`;
    logger.warn(`SOAP request error for ${service}.${action}: ${message}`);
    throw new NetworkError(service, action, message, error);
  }

  debugManager.trace('soap', `SOAP Response from ${url}`, { action, status: response.status, body: responseText });

  if (!response.ok) {
    // UPnP reports action errors as HTTP 500 with a Fault body
    if (response.status === 500 && responseText.includes('Fault')) {
      // Throws for a fault; an ordinary response under a 500 is still a failure
      parseSoapResponse(responseText, service, action);
    }
    logger.warn(`SOAP request failed: ${response.status} ${response.statusText}`, { service, action });
    throw new NetworkError(service, action, `${action} failed: HTTP ${response.status} ${response.statusText}`);
  }

  const result = parseSoapResponse(responseText, service, action);
  debugManager.debug('soap', `SOAP Response from ${url} - ${action} completed`);
  return result;
}
