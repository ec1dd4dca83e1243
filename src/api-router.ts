import type { IncomingMessage, ServerResponse } from 'http';
import logger from './utils/logger.js';
import { debugManager, isDebugCategory, isLogLevel, DEBUG_CATEGORIES } from './utils/debug-manager.js';
import { getErrorMessage } from './utils/error-helper.js';
import { parseDuration } from './utils/duration.js';
import { getButtonCatalog } from './remote-buttons.js';
import { createError, getErrorStatusCode, isStreamerError } from './errors/streamer-errors.js';
import type { StreamerDevice, PlayUrlMetadata } from './streamer-device.js';
import type { RemoteCommandBridge } from './remote-command-bridge.js';
import type { ApiResponse, Config, ErrorResponse, RouteParams, SuccessResponse } from './types/streamer.js';

type RouteHandler = (params: RouteParams, queryParams: URLSearchParams, body: string) => Promise<ApiResponse>;

/**
 * What the router needs from a streamer
 */
export type StreamerControl = Pick<StreamerDevice,
  | 'getSnapshot' | 'getState' | 'getCapabilities' | 'getDescriptor'
  | 'play' | 'pause' | 'stop' | 'nextTrack' | 'previousTrack'
  | 'setVolume' | 'adjustVolume' | 'setMute' | 'selectSource' | 'seek' | 'setPlayMode' | 'playUrl'
  | 'reconnect'
>;

export type RemoteControl = Pick<RemoteCommandBridge, 'press' | 'listButtons'>;

export interface StreamEvent {
  type: string;
  data: unknown;
}

const SUCCESS: SuccessResponse = { status: 'success' };

/**
 * HTTP API over one streamer and its remote bridge.
 * Maps URL patterns to handler functions and manages the SSE clients.
 */
export class ApiRouter {
  private routes = new Map<string, RouteHandler>();
  private sseClients: ServerResponse[] = [];
  private readonly startedAt = Date.now();

  constructor(
    private readonly device: StreamerControl,
    private readonly config: Pick<Config, 'isDevelopment'>,
    private readonly bridge?: RemoteControl
  ) {
    this.registerRoutes();
  }

  get clientCount(): number {
    return this.sseClients.length;
  }

  /**
   * Registers all API routes with their handlers.
   */
  private registerRoutes(): void {
    // System routes
    this.routes.set('GET /health', this.getHealth.bind(this));
    this.routes.set('GET /state', this.getState.bind(this));
    this.routes.set('GET /capabilities', this.getCapabilities.bind(this));
    this.routes.set('GET /device', this.getDevice.bind(this));
    this.routes.set('POST /reconnect', this.reconnect.bind(this));

    // Transport
    this.routes.set('GET /play', this.command(() => this.device.play()));
    this.routes.set('GET /pause', this.command(() => this.device.pause()));
    this.routes.set('GET /stop', this.command(() => this.device.stop()));
    this.routes.set('GET /next', this.command(() => this.device.nextTrack()));
    this.routes.set('GET /previous', this.command(() => this.device.previousTrack()));
    this.routes.set('GET /seek/{position}', this.seek.bind(this));
    this.routes.set('GET /playmode/{mode}', this.setPlayMode.bind(this));
    this.routes.set('POST /playurl', this.playUrl.bind(this));

    // Register more specific routes first
    this.routes.set('GET /volume/+{delta}', this.volumeUp.bind(this));
    this.routes.set('GET /volume/-{delta}', this.volumeDown.bind(this));
    this.routes.set('GET /volume/{level}', this.setVolume.bind(this));
    this.routes.set('GET /mute', this.command(() => this.device.setMute(true)));
    this.routes.set('GET /unmute', this.command(() => this.device.setMute(false)));
    this.routes.set('GET /togglemute', this.toggleMute.bind(this));

    this.routes.set('GET /source/{source}', this.selectSource.bind(this));

    // Remote bridge
    this.routes.set('GET /buttons', this.getButtons.bind(this));
    this.routes.set('GET /button/{id}', this.pressButton.bind(this));

    // Debug routes
    this.routes.set('GET /debug', this.getDebugStatus.bind(this));
    this.routes.set('GET /debug/level/{level}', this.setDebugLevel.bind(this));
    this.routes.set('GET /debug/category/{category}/{enabled}', this.setDebugCategory.bind(this));
    this.routes.set('GET /debug/enable-all', this.enableAllDebug.bind(this));
    this.routes.set('GET /debug/disable-all', this.disableAllDebug.bind(this));
  }

  /**
   * Main request handler for all HTTP requests.
   * Handles CORS, the SSE stream, routing, and error responses.
   */
  async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method || 'GET';
    const [path = '/', queryString] = (req.url || '/').split('?');
    const queryParams = new URLSearchParams(queryString || '');

    debugManager.info('api', `${method} ${path}`, { ip: req.socket.remoteAddress });

    // Enable CORS
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');

    if (method === 'OPTIONS') {
      res.statusCode = 204;
      res.end();
      return;
    }

    if (method === 'GET' && path === '/events') {
      this.openEventStream(res);
      return;
    }

    res.setHeader('Content-Type', 'application/json');

    try {
      // Parse POST body if needed
      const body = method === 'POST' ? await readBody(req) : '';
      const result = await this.routeRequest(method, path, queryParams, body);
      res.statusCode = result.status || 200;
      res.end(JSON.stringify(result.body ?? SUCCESS));
    } catch (error) {
      const status = getErrorStatusCode(error);
      if (status >= 500) {
        debugManager.error('api', `Request error: ${getErrorMessage(error)}`);
      } else {
        debugManager.warn('api', `Request rejected (${status}): ${getErrorMessage(error)}`);
      }
      res.statusCode = status;

      const errorResponse: ErrorResponse = {
        status: 'error',
        error: getErrorMessage(error) || 'Internal server error'
      };
      if (isStreamerError(error) && error.code) {
        errorResponse.code = error.code;
      }
      if (this.config.isDevelopment && error instanceof Error && error.stack) {
        errorResponse.stack = error.stack;
      }

      res.end(JSON.stringify(errorResponse));
    }
  }

  /**
   * Push an event to every open /events stream; clients that fail a write are dropped
   */
  broadcast(event: StreamEvent): void {
    const sseData = `data: ${JSON.stringify(event)}\n\n`;
    debugManager.debug('sse', `Sending ${event.type} to ${this.sseClients.length} SSE clients`);
    this.sseClients = this.sseClients.filter(client => {
      try {
        client.write(sseData);
        return true;
      } catch (error) {
        debugManager.error('sse', `Error writing to client: ${getErrorMessage(error)}`);
        return false;
      }
    });
  }

  /**
   * End all event streams (shutdown)
   */
  closeClients(): void {
    this.sseClients.forEach(client => client.end());
    this.sseClients = [];
  }

  private openEventStream(res: ServerResponse): void {
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      'Connection': 'keep-alive',
      'Access-Control-Allow-Origin': '*'
    });

    this.sseClients.push(res);
    debugManager.info('sse', `SSE client connected (${this.sseClients.length} total)`);

    res.on('close', () => {
      this.sseClients = this.sseClients.filter(client => client !== res);
      debugManager.info('sse', `SSE client disconnected (${this.sseClients.length} total)`);
    });

    // Send initial ping and the current snapshot
    res.write(':ping\n\n');
    res.write(`data: ${JSON.stringify({ type: 'snapshot', data: this.device.getSnapshot() })}\n\n`);
  }

  /**
   * Routes requests to the appropriate handler based on method and path.
   * Supports both exact matches and pattern matching with parameters.
   */
  private async routeRequest(method: string, path: string, queryParams: URLSearchParams, body: string): Promise<ApiResponse> {
    // Try exact match first
    let handler = this.routes.get(`${method} ${path}`);
    let params: RouteParams = {};

    if (!handler) {
      for (const [pattern, routeHandler] of this.routes) {
        const [routeMethod, routePath] = pattern.split(' ');
        if (routeMethod !== method || !routePath) continue;

        const match = this.matchPath(path, routePath);
        if (match) {
          handler = routeHandler;
          params = match;
          break;
        }
      }
    }

    if (!handler) {
      throw createError(404, 'Not found');
    }

    return handler(params, queryParams, body);
  }

  /**
   * Matches a request path against a route pattern.
   * Extracts parameters from segments like {level}, or +{delta} with a prefix.
   */
  private matchPath(actualPath: string, pattern: string): RouteParams | null {
    const actualParts = actualPath.split('/').filter(Boolean);
    const patternParts = pattern.split('/').filter(Boolean);

    if (actualParts.length !== patternParts.length) {
      return null;
    }

    const params: RouteParams = {};

    for (let i = 0; i < patternParts.length; i++) {
      const patternPart = patternParts[i];
      const actualPart = actualParts[i];
      if (patternPart === undefined || actualPart === undefined) {
        return null;
      }

      const paramMatch = patternPart.match(/^(.*)\{([^}]+)\}(.*)$/);
      if (!paramMatch) {
        if (patternPart !== actualPart) {
          return null;
        }
        continue;
      }

      const [, prefix = '', paramName = '', suffix = ''] = paramMatch;
      if (!actualPart.startsWith(prefix) || !actualPart.endsWith(suffix) || actualPart.length <= prefix.length + suffix.length) {
        return null;
      }
      const value = actualPart.slice(prefix.length, actualPart.length - suffix.length);
      try {
        params[paramName] = decodeURIComponent(value);
      } catch {
        logger.debug(`Malformed URL parameter '${paramName}' in path '${actualPath}': ${value}`);
        return null;
      }
    }

    return params;
  }

  private command(action: () => Promise<void>): RouteHandler {
    return async () => {
      await action();
      return { status: 200, body: SUCCESS };
    };
  }

  // System endpoints

  private async getHealth(): Promise<ApiResponse> {
    return {
      status: 200,
      body: {
        status: 'healthy',
        state: this.device.getState(),
        connected: this.device.getCapabilities() !== undefined,
        remote: this.bridge !== undefined,
        uptime: Math.round((Date.now() - this.startedAt) / 1000)
      }
    };
  }

  private async getState(): Promise<ApiResponse> {
    return {
      status: 200,
      body: {
        state: this.device.getState(),
        snapshot: this.device.getSnapshot()
      }
    };
  }

  private async getCapabilities(): Promise<ApiResponse> {
    const capabilities = this.device.getCapabilities();
    if (!capabilities) {
      throw createError(503, 'Streamer not connected');
    }
    // Sets do not serialize; list the actions instead
    const actions: Record<string, string[]> = {};
    for (const [service, names] of Object.entries(capabilities.actions)) {
      actions[service] = [...names].sort();
    }
    return { status: 200, body: { ...capabilities, actions } };
  }

  private async getDevice(): Promise<ApiResponse> {
    const descriptor = this.device.getDescriptor();
    if (!descriptor) {
      throw createError(503, 'Streamer not connected');
    }
    return {
      status: 200,
      body: {
        friendlyName: descriptor.friendlyName,
        manufacturer: descriptor.manufacturer,
        modelName: descriptor.modelName,
        udn: descriptor.udn,
        location: descriptor.location,
        services: Object.keys(descriptor.services)
      }
    };
  }

  private async reconnect(): Promise<ApiResponse> {
    await this.device.reconnect();
    return { status: 200, body: { status: 'success', state: this.device.getState() } };
  }

  // Transport and volume

  private async setVolume({ level }: RouteParams): Promise<ApiResponse> {
    if (!level || !/^\d+$/.test(level)) {
      throw createError(400, 'Volume must be a number between 0 and 100');
    }
    await this.device.setVolume(parseInt(level, 10));
    return { status: 200, body: SUCCESS };
  }

  private async volumeUp({ delta }: RouteParams): Promise<ApiResponse> {
    await this.device.adjustVolume(parseDelta(delta));
    return { status: 200, body: SUCCESS };
  }

  private async volumeDown({ delta }: RouteParams): Promise<ApiResponse> {
    await this.device.adjustVolume(-parseDelta(delta));
    return { status: 200, body: SUCCESS };
  }

  private async toggleMute(): Promise<ApiResponse> {
    const muted = this.device.getSnapshot().mute === true;
    await this.device.setMute(!muted);
    return { status: 200, body: { status: 'success', muted: !muted } };
  }

  private async selectSource({ source }: RouteParams): Promise<ApiResponse> {
    if (!source) throw createError(400, 'Source parameter is required');
    await this.device.selectSource(source);
    return { status: 200, body: SUCCESS };
  }

  /**
   * Seconds ("95") or a clock time ("0:01:35")
   */
  private async seek({ position }: RouteParams): Promise<ApiResponse> {
    const seconds = position && /^\d+(\.\d+)?$/.test(position)
      ? parseFloat(position)
      : parseDuration(position ?? '');
    if (seconds === undefined) {
      throw createError(400, `Invalid seek position: ${position}`);
    }
    await this.device.seek(seconds);
    return { status: 200, body: SUCCESS };
  }

  private async setPlayMode({ mode }: RouteParams): Promise<ApiResponse> {
    if (!mode) throw createError(400, 'Mode parameter is required');
    await this.device.setPlayMode(mode.toUpperCase());
    return { status: 200, body: SUCCESS };
  }

  /**
   * Body: { "uri": "...", "title"?, "artist"?, "album"?, "artworkUrl"?, "mimeType"? }
   */
  private async playUrl(_params: RouteParams, _query: URLSearchParams, body: string): Promise<ApiResponse> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      throw createError(400, 'Request body must be JSON');
    }
    if (typeof parsed !== 'object' || parsed === null || !('uri' in parsed) || typeof parsed.uri !== 'string') {
      throw createError(400, 'Request body needs a uri');
    }

    const metadata: PlayUrlMetadata = {};
    for (const key of ['title', 'artist', 'album', 'artworkUrl', 'mimeType'] as const) {
      const value: unknown = key in parsed ? Reflect.get(parsed, key) : undefined;
      if (typeof value === 'string' && value !== '') {
        metadata[key] = value;
      }
    }

    await this.device.playUrl(parsed.uri, metadata);
    return { status: 200, body: SUCCESS };
  }

  // Remote bridge

  private async getButtons(): Promise<ApiResponse> {
    if (this.bridge) {
      return { status: 200, body: this.bridge.listButtons() };
    }
    return {
      status: 200,
      body: getButtonCatalog().map(button => ({ ...button, configured: false }))
    };
  }

  private async pressButton({ id }: RouteParams, queryParams: URLSearchParams): Promise<ApiResponse> {
    if (!id) throw createError(400, 'Button id is required');
    if (!this.bridge) {
      throw createError(501, 'Remote bridge not configured');
    }

    const repeatsParam = queryParams.get('repeats');
    let repeats = 1;
    if (repeatsParam !== null) {
      if (!/^\d+$/.test(repeatsParam) || parseInt(repeatsParam, 10) < 1) {
        throw createError(400, 'repeats must be a positive integer');
      }
      repeats = parseInt(repeatsParam, 10);
    }

    await this.bridge.press(id, { repeats });
    return { status: 200, body: { status: 'success', button: id.toLowerCase(), repeats } };
  }

  // Debug endpoints

  private async getDebugStatus(): Promise<ApiResponse> {
    return {
      status: 200,
      body: {
        logLevel: debugManager.getLogLevel(),
        categories: debugManager.getCategories(),
        sseClients: this.sseClients.length
      }
    };
  }

  private async setDebugLevel({ level }: RouteParams): Promise<ApiResponse> {
    const normalized = level?.toLowerCase() ?? '';
    if (!isLogLevel(normalized)) {
      throw createError(400, 'Invalid log level. Must be one of: error, warn, info, debug, trace');
    }
    debugManager.setLogLevel(normalized);
    return { status: 200, body: { status: 'success', logLevel: normalized } };
  }

  private async setDebugCategory({ category, enabled }: RouteParams): Promise<ApiResponse> {
    const normalized = category?.toLowerCase() ?? '';
    if (!isDebugCategory(normalized)) {
      throw createError(400, `Invalid category. Must be one of: ${DEBUG_CATEGORIES.join(', ')}`);
    }
    if (!enabled) throw createError(400, 'Enabled parameter is required');

    const isEnabled = enabled.toLowerCase() === 'true';
    debugManager.setCategory(normalized, isEnabled);
    return { status: 200, body: { status: 'success', category: normalized, enabled: isEnabled } };
  }

  private async enableAllDebug(): Promise<ApiResponse> {
    debugManager.enableAll();
    return { status: 200, body: { status: 'success', categories: debugManager.getCategories() } };
  }

  private async disableAllDebug(): Promise<ApiResponse> {
    debugManager.disableAll();
    return { status: 200, body: { status: 'success', categories: debugManager.getCategories() } };
  }
}

function parseDelta(delta: string | undefined): number {
  if (!delta || !/^\d+$/.test(delta)) {
    throw createError(400, 'Volume delta must be a positive integer');
  }
  return parseInt(delta, 10);
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    let data = '';
    req.setEncoding('utf-8');
    req.on('data', (chunk: string) => {
      data += chunk;
    });
    req.on('end', () => resolve(data));
    req.on('error', reject);
  });
}
