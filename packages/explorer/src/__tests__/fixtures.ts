import { Logger } from '@roamer/shared';
import { parseConfig, type EngineConfig, type EngineConfigInput } from '../config.js';
import type { AutomationDriver, DriverCommand, DriverOutcome } from '../driver.js';
import type { OracleEndpoint, OracleRequest } from '../llm-endpoint.js';
import type { AppTarget, JobDescriptor, UiSnapshot } from '../types.js';

export const silentLogger = new Logger({ silent: true });

// =============================================================================
// Hierarchy builders
// =============================================================================

export interface FakeNode {
  cls?: string;
  text?: string;
  id?: string;
  desc?: string;
  clickable?: boolean;
  checkable?: boolean;
  longClickable?: boolean;
  scrollable?: boolean;
  enabled?: boolean;
  focused?: boolean;
  bounds?: string;
  index?: number;
  children?: FakeNode[];
}

function escapeXml(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/"/g, '&quot;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function nodeXml(node: FakeNode, pkg = 'com.example.shop'): string {
  const attrs: Record<string, string> = {
    index: String(node.index ?? 0),
    text: node.text ?? '',
    'resource-id': node.id ? `${pkg}:id/${node.id}` : '',
    class: node.cls ?? 'android.widget.FrameLayout',
    package: pkg,
    'content-desc': node.desc ?? '',
    checkable: String(node.checkable ?? false),
    checked: 'false',
    clickable: String(node.clickable ?? false),
    enabled: String(node.enabled ?? true),
    focusable: 'false',
    focused: String(node.focused ?? false),
    scrollable: String(node.scrollable ?? false),
    'long-clickable': String(node.longClickable ?? false),
    password: 'false',
    selected: 'false',
    bounds: node.bounds ?? '[0,0][1080,1920]',
  };
  const rendered = Object.entries(attrs)
    .map(([key, value]) => `${key}="${escapeXml(value)}"`)
    .join(' ');
  const children = (node.children ?? []).map((child) => nodeXml(child, pkg)).join('');
  return children ? `<node ${rendered}>${children}</node>` : `<node ${rendered} />`;
}

export function hierarchyXml(...roots: FakeNode[]): string {
  return `<?xml version='1.0' encoding='UTF-8' standalone='yes' ?><hierarchy rotation="0">${roots
    .map((root) => nodeXml(root))
    .join('')}</hierarchy>`;
}

export function button(id: string, text: string, bounds: string, extra: Partial<FakeNode> = {}): FakeNode {
  return { cls: 'android.widget.Button', id, text, clickable: true, bounds, ...extra };
}

export function screen(title: string, ...children: FakeNode[]): FakeNode {
  return {
    cls: 'android.widget.FrameLayout',
    bounds: '[0,0][1080,1920]',
    children: [{ cls: 'android.widget.TextView', text: title, bounds: '[0,0][1080,150]' }, ...children],
  };
}

// =============================================================================
// Fake app
// =============================================================================

export interface FakeScreen {
  xml: string;
  /** `<command type>:<id>` or `back` -> screen name, or `crash` */
  transitions: Record<string, string>;
}

export const SHOP_SCREENS: Record<string, FakeScreen> = {
  'com.example.shop.HomeActivity': {
    xml: hierarchyXml(
      screen(
        'Home',
        button('catalog', 'Catalog', '[0,200][1080,400]'),
        button('settings', 'Settings', '[0,400][1080,600]')
      )
    ),
    transitions: {
      'tap:catalog': 'com.example.shop.CatalogActivity',
      'tap:settings': 'com.example.shop.SettingsActivity',
    },
  },
  'com.example.shop.CatalogActivity': {
    xml: hierarchyXml(screen('Catalog', button('item', 'Item 1', '[0,200][1080,400]'))),
    transitions: {
      'tap:item': 'com.example.shop.DetailActivity',
      back: 'com.example.shop.HomeActivity',
    },
  },
  'com.example.shop.SettingsActivity': {
    xml: hierarchyXml(
      screen(
        'Settings',
        { cls: 'android.widget.Switch', id: 'dark', text: 'Dark mode', checkable: true, bounds: '[0,200][1080,300]' },
        button('crash', 'Crash me', '[0,300][1080,400]')
      )
    ),
    transitions: {
      'tap:dark': 'com.example.shop.SettingsActivity',
      'tap:crash': 'crash',
      back: 'com.example.shop.HomeActivity',
    },
  },
  'com.example.shop.DetailActivity': {
    xml: hierarchyXml(screen('Detail', button('buy', 'Buy', '[0,1700][1080,1900]'))),
    transitions: {
      back: 'com.example.shop.CatalogActivity',
    },
  },
};

export const SHOP_ENTRY = 'com.example.shop.HomeActivity';

export function shopSnapshot(screenName: string = SHOP_ENTRY): UiSnapshot {
  const entry = SHOP_SCREENS[screenName];
  if (!entry) throw new Error(`Fake app has no screen ${screenName}`);
  return { screenName, hierarchy: entry.xml, packageName: 'com.example.shop' };
}

export const LOGIN_XML = hierarchyXml(
  screen(
    'Sign in',
    { cls: 'android.widget.EditText', id: 'email', clickable: true, bounds: '[0,200][1080,300]' },
    { cls: 'android.widget.ScrollView', id: 'terms', scrollable: true, bounds: '[0,300][1080,1900]' }
  )
);

export class FakeDriver implements AutomationDriver {
  current: string;
  performed: DriverCommand[] = [];
  restarts = 0;
  captures = 0;
  /** Captures that return a blank hierarchy before succeeding again */
  blankCaptures = 0;
  /** Outcomes returned instead of executing the next commands */
  forcedOutcomes: DriverOutcome[] = [];
  /** Commands that never answer */
  hangingCommands = 0;

  constructor(
    readonly serial: string,
    private screens: Record<string, FakeScreen> = SHOP_SCREENS,
    private entry: string = SHOP_ENTRY
  ) {
    this.current = entry;
  }

  async capture(): Promise<UiSnapshot> {
    this.captures++;
    if (this.blankCaptures > 0) {
      this.blankCaptures--;
      return { screenName: this.current, hierarchy: '' };
    }
    const current = this.screens[this.current];
    if (!current) throw new Error(`Fake app has no screen ${this.current}`);
    return { screenName: this.current, hierarchy: current.xml, packageName: 'com.example.shop' };
  }

  async perform(command: DriverCommand): Promise<DriverOutcome> {
    this.performed.push(command);

    if (this.hangingCommands > 0) {
      this.hangingCommands--;
      return new Promise<DriverOutcome>(() => undefined);
    }

    const forced = this.forcedOutcomes.shift();
    if (forced && forced !== 'ok') return forced;

    const key = command.type === 'back' ? 'back' : `${command.type}:${command.target.resourceId?.split('/').pop() ?? ''}`;
    const next = this.screens[this.current]?.transitions[key];
    if (next === 'crash') return 'app-crashed';
    if (next) this.current = next;
    return 'ok';
  }

  async restartApp(_app: AppTarget): Promise<void> {
    this.restarts++;
    this.current = this.entry;
  }
}

// =============================================================================
// Scripted oracle endpoint
// =============================================================================

export type ScriptedReply = string | Error | 'hang' | ((request: OracleRequest) => string);

export class ScriptedEndpoint implements OracleEndpoint {
  calls: OracleRequest[] = [];

  constructor(
    private replies: ScriptedReply[] = [],
    private whenEmpty: ScriptedReply = '{"action":"back","reason":"nothing scripted"}'
  ) {}

  async complete(request: OracleRequest): Promise<string> {
    this.calls.push({ system: request.system, messages: request.messages.map((message) => ({ ...message })) });
    const reply = this.replies.length > 0 ? this.replies.shift() : this.whenEmpty;

    if (reply === undefined) return '';
    if (reply === 'hang') return new Promise<string>(() => undefined);
    if (reply instanceof Error) throw reply;
    if (typeof reply === 'function') return reply(request);
    return reply;
  }
}

/** Reply with a tap on the element whose text matches, or back when absent */
export function tapByText(text: string): (request: OracleRequest) => string {
  return (request) => {
    const prompt = request.messages[0]?.content ?? '';
    const line = prompt.split('\n').find((candidate) => candidate.includes(`"${text}"`));
    const id = line?.match(/^(e\d+)/)?.[1];
    return id ? JSON.stringify({ action: 'tap', element: id, reason: `open ${text}` }) : '{"action":"back"}';
  };
}

// =============================================================================
// Config and jobs
// =============================================================================

export function testConfig(overrides: EngineConfigInput = {}): EngineConfig {
  const base = parseConfig({
    session: { waitBetweenStepsMs: 0, captureRetryDelayMs: 0, stepBudget: 10, ...overrides.session },
    loop: { ...overrides.loop },
    oracle: { backoffBaseMs: 0, timeoutMs: 1000, ...overrides.oracle },
    executor: { restartSettleMs: 0, driverTimeoutMs: 1000, ...overrides.executor },
    graph: { ...overrides.graph },
    fingerprint: { ...overrides.fingerprint },
    scheduler: { ...overrides.scheduler },
    knowledge: { path: null, ...overrides.knowledge },
    logging: { level: 'error', ...overrides.logging },
  });
  return base;
}

export function shopJob(id = 'shop', extra: Partial<JobDescriptor> = {}): JobDescriptor {
  return {
    id,
    app: { packageName: 'com.example.shop' },
    selector: { tags: [] },
    ...extra,
  };
}
