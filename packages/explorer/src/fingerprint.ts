/**
 * State Fingerprinter
 *
 * Parses a uiautomator XML dump into a canonical form, hashes it into a
 * StateFingerprint and enumerates the actionable elements in depth-first
 * document order. The same logical screen always yields the same hash and
 * the same element numbering, which keeps oracle prompts reproducible.
 */

import { createHash } from 'crypto';
import { parseStringPromise } from 'xml2js';
import { z } from 'zod';
import type { FingerprintLevel } from './config.js';
import { CaptureError } from './errors.js';
import type {
  ActionableElement,
  BoundingBox,
  ElementRole,
  Interaction,
  ObservedState,
  UiSnapshot,
} from './types.js';

// =============================================================================
// Raw hierarchy
// =============================================================================

export interface RawNode {
  $?: Record<string, string>;
  node?: RawNode[];
}

const RawNodeSchema: z.ZodType<RawNode> = z.lazy(() =>
  z.object({
    $: z.record(z.string()).optional(),
    node: z.array(RawNodeSchema).optional(),
  })
);

const RawHierarchySchema = z.object({
  hierarchy: z.object({
    node: z.array(RawNodeSchema).optional(),
  }),
});

// =============================================================================
// Constants
// =============================================================================

/** Attributes that change between frames of the same screen */
const VOLATILE_ATTRIBUTES = new Set(['bounds', 'index', 'focused', 'drawing-order']);

/** Attributes carrying user-visible copy, ignored above the `text` level */
const TEXT_ATTRIBUTES = new Set(['text', 'content-desc', 'hint']);

const TEXT_INPUT_CLASSES = new Set([
  'android.widget.EditText',
  'android.widget.AutoCompleteTextView',
  'android.widget.MultiAutoCompleteTextView',
  'android.inputmethodservice.ExtractEditText',
  'androidx.appcompat.widget.AppCompatEditText',
  'com.google.android.material.textfield.TextInputEditText',
]);

const ROLE_MAPPING: Record<string, ElementRole> = {
  'android.widget.Button': 'button',
  'android.widget.ImageButton': 'button',
  'android.widget.EditText': 'input',
  'android.widget.TextView': 'text',
  'android.widget.ImageView': 'image',
  'android.widget.CheckBox': 'checkbox',
  'android.widget.RadioButton': 'radio',
  'android.widget.Switch': 'switch',
  'android.widget.ToggleButton': 'switch',
  'android.widget.Spinner': 'select',
  'android.widget.SeekBar': 'slider',
  'android.widget.ScrollView': 'scroll',
  'android.widget.HorizontalScrollView': 'scroll',
  'android.widget.ListView': 'list',
  'androidx.recyclerview.widget.RecyclerView': 'list',
  'android.widget.TabWidget': 'tab',
  'android.view.View': 'view',
  'android.view.ViewGroup': 'container',
  'android.widget.FrameLayout': 'container',
  'android.widget.LinearLayout': 'container',
  'android.widget.RelativeLayout': 'container',
};

// =============================================================================
// Helpers
// =============================================================================

/**
 * Parse bounds string "[x1,y1][x2,y2]" into structured BoundingBox
 */
export function parseBounds(boundsStr: string | undefined): BoundingBox | null {
  if (!boundsStr) return null;

  const match = boundsStr.match(/\[(-?\d+),(-?\d+)\]\[(-?\d+),(-?\d+)\]/);
  if (!match) return null;

  const x1 = parseInt(match[1], 10);
  const y1 = parseInt(match[2], 10);
  const x2 = parseInt(match[3], 10);
  const y2 = parseInt(match[4], 10);

  const width = x2 - x1;
  const height = y2 - y1;

  return {
    x1,
    y1,
    x2,
    y2,
    width,
    height,
    centerX: x1 + width / 2,
    centerY: y1 + height / 2,
    area: width * height,
  };
}

function mapRole(className: string, interactions: Interaction[]): ElementRole {
  const mapped = ROLE_MAPPING[className];
  if (mapped) return mapped;

  const simpleName = (className.split('.').pop() ?? className).toLowerCase();

  if (interactions.includes('type-text')) return 'input';
  if (simpleName.includes('button')) return 'button';
  if (simpleName.includes('check')) return 'checkbox';
  if (simpleName.includes('switch')) return 'switch';
  if (simpleName.includes('tab')) return 'tab';
  if (simpleName.includes('recycler') || simpleName.includes('list')) return 'list';
  if (simpleName.includes('scroll') || interactions.includes('swipe')) return 'scroll';
  if (simpleName.includes('image')) return 'image';
  if (simpleName.includes('text')) return 'text';
  if (simpleName.includes('layout')) return 'container';
  return 'view';
}

function flag(attrs: Record<string, string>, name: string): boolean {
  return attrs[name] === 'true';
}

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function isTextInput(attrs: Record<string, string>): boolean {
  const className = attrs.class ?? '';
  return TEXT_INPUT_CLASSES.has(className) || className.endsWith('EditText');
}

function interactionsFor(attrs: Record<string, string>): Interaction[] {
  if (attrs.enabled === 'false') return [];

  const interactions: Interaction[] = [];
  const textInput = isTextInput(attrs);
  if (flag(attrs, 'clickable') || flag(attrs, 'checkable') || textInput) interactions.push('tap');
  if (flag(attrs, 'long-clickable')) interactions.push('long-press');
  if (textInput) interactions.push('type-text', 'submit');
  if (flag(attrs, 'scrollable')) interactions.push('swipe');
  return interactions;
}

/** Mask digit runs so clocks, counters and badges do not split a screen */
function maskVolatileText(value: string): string {
  return value.replace(/\d+/g, '#');
}

export function actionKeyFor(interaction: Interaction | 'back', element?: Pick<ActionableElement, 'signature'>): string {
  if (interaction === 'back' || !element) return 'back';
  return `${interaction}:${element.signature}`;
}

// =============================================================================
// Fingerprinter
// =============================================================================

export interface FingerprinterOptions {
  level?: FingerprintLevel;
}

export class Fingerprinter {
  readonly level: FingerprintLevel;

  constructor(options: FingerprinterOptions = {}) {
    this.level = options.level ?? 'attributes';
  }

  /**
   * Reduce a snapshot to its fingerprint and actionable element set.
   *
   * @throws CaptureError if the snapshot is empty or not a UI hierarchy
   */
  async observe(snapshot: UiSnapshot): Promise<ObservedState> {
    const roots = await this.parse(snapshot);

    const elements: ActionableElement[] = [];
    const texts: string[] = [];
    let nodeCount = 0;
    let packageName: string | null = null;

    const visit = (node: RawNode, path: string): void => {
      nodeCount++;
      const attrs = node.$ ?? {};
      packageName = packageName ?? nonEmpty(attrs.package);

      const text = nonEmpty(attrs.text);
      if (text && !texts.includes(text)) texts.push(text);

      const interactions = interactionsFor(attrs);
      const bounds = parseBounds(attrs.bounds);
      if (interactions.length > 0 && bounds && bounds.area > 0) {
        const className = attrs.class ?? 'unknown';
        const resourceId = nonEmpty(attrs['resource-id']);
        elements.push({
          id: `e${elements.length + 1}`,
          role: mapRole(className, interactions),
          bounds,
          text,
          label: nonEmpty(attrs['content-desc']),
          resourceId,
          className,
          interactions,
          path,
          signature: `${className}#${resourceId ?? ''}@${path}`,
        });
      }

      (node.node ?? []).forEach((child, index) => visit(child, `${path}.${index}`));
    };

    roots.forEach((root, index) => visit(root, String(index)));

    return {
      fingerprint: this.hash(snapshot.screenName, roots),
      screenName: snapshot.screenName,
      packageName: snapshot.packageName ?? packageName,
      elements,
      summary: {
        nodeCount,
        actionableCount: elements.length,
        texts,
      },
    };
  }

  /**
   * Canonical text form of a hierarchy at the configured level. Exposed so
   * tests and debugging tools can see exactly what gets hashed.
   */
  canonicalize(roots: RawNode[]): string {
    if (this.level === 'screen') return '';
    return roots.map((root) => this.canonicalNode(root)).join('');
  }

  private hash(screenName: string, roots: RawNode[]): string {
    return createHash('sha256').update(`${screenName}\n${this.canonicalize(roots)}`).digest('hex');
  }

  private canonicalNode(node: RawNode): string {
    const attrs = node.$ ?? {};
    let head: string;

    if (this.level === 'layout') {
      head = attrs.class ?? '';
    } else {
      head = Object.keys(attrs)
        .filter((key) => !VOLATILE_ATTRIBUTES.has(key))
        .filter((key) => this.level === 'text' || !TEXT_ATTRIBUTES.has(key))
        .sort()
        .map((key) => {
          const value = TEXT_ATTRIBUTES.has(key) ? maskVolatileText(attrs[key]) : attrs[key];
          return `${key}=${JSON.stringify(value)}`;
        })
        .join(' ');
    }

    const children = (node.node ?? []).map((child) => this.canonicalNode(child)).join('');
    return `(${head}${children ? `[${children}]` : ''})`;
  }

  private async parse(snapshot: UiSnapshot): Promise<RawNode[]> {
    if (!snapshot.hierarchy.trim()) {
      throw new CaptureError(`Empty UI hierarchy for ${snapshot.screenName || 'unknown screen'}`);
    }

    let document: unknown;
    try {
      document = await parseStringPromise(snapshot.hierarchy);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new CaptureError(`Malformed UI hierarchy: ${message}`, { screenName: snapshot.screenName });
    }

    const parsed = RawHierarchySchema.safeParse(document);
    if (!parsed.success) {
      throw new CaptureError('UI hierarchy has no <hierarchy> root', { screenName: snapshot.screenName });
    }

    const roots = parsed.data.hierarchy.node ?? [];
    if (roots.length === 0) {
      throw new CaptureError(`Blank screen captured for ${snapshot.screenName || 'unknown screen'}`);
    }
    return roots;
  }
}
