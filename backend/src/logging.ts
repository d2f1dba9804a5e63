import debug, { type Debugger } from 'debug';

export const NAMESPACES = {
  server: {
    main: 'worldmind:server',
    routes: 'worldmind:server:routes'
  },
  engine: {
    workflow: 'worldmind:workflow',
    memory: 'worldmind:memory',
    queue: 'worldmind:queue',
    scheduler: 'worldmind:scheduler',
    thoughts: 'worldmind:thoughts'
  },
  world: {
    sensor: 'worldmind:world:sensor',
    executor: 'worldmind:world:executor'
  },
  llm: {
    client: 'worldmind:llm:client',
    custom: 'worldmind:llm:custom',
    mock: 'worldmind:llm:mock'
  },
  config: 'worldmind:config'
} as const;

export type Logger = Debugger;

export const createLogger = (namespace: string): Logger => debug(namespace);

/** Applies the namespace filter from config unless DEBUG is already set. */
export function applyDebugSettings(settings?: { enabledNamespaces?: string }): void {
  if (process.env.DEBUG) return;
  if (settings?.enabledNamespaces) {
    debug.enable(settings.enabledNamespaces);
  }
}
