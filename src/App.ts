import blessed from 'neo-blessed';
import type { Widgets } from 'blessed';
import { setupKeyBindings } from './KeyBindings.js';
import type { StatusAction } from './keymap.js';
import { formatHint } from './keymap.js';
import { abbreviateHomePath } from './config.js';
import type { Config } from './config.js';
import { GitRepository } from './git/repository.js';
import { StatusBuffer } from './core/StatusBuffer.js';
import { StatusBufferRegistry } from './core/StatusBufferRegistry.js';
import { RepoWatcher } from './core/RepoWatcher.js';
import { FOLD_DEPTHS } from './status/folds.js';
import type { EditTarget } from './status/navigation.js';
import { StatusView } from './ui/StatusView.js';
import { DiscardConfirm } from './ui/modals/DiscardConfirm.js';
import { formatFooter } from './ui/widgets/Footer.js';
import type { FooterState } from './ui/widgets/Footer.js';
import * as logger from './utils/logger.js';

export interface AppOptions {
  config: Config;
  initialPath?: string;
}

const MESSAGE_TIMEOUT_MS = 5000;

interface OpenBuffer {
  buffer: StatusBuffer;
  view: StatusView;
}

/**
 * Main application controller.
 * Owns the screen and the buffer registry and routes keys to the current buffer.
 */
export class App {
  private screen: Widgets.Screen;
  private footerBox: Widgets.BoxElement;
  private config: Config;
  private registry = new StatusBufferRegistry();
  private open = new Map<string, OpenBuffer>();
  private current: OpenBuffer | null = null;
  private activeModal: DiscardConfirm | null = null;
  private message: FooterState['message'] = null;
  private messageTimer: ReturnType<typeof setTimeout> | null = null;
  private initialPath: string;

  constructor(options: AppOptions) {
    this.config = options.config;
    this.initialPath = options.initialPath ?? process.cwd();

    this.screen = blessed.screen({
      smartCSR: true,
      fullUnicode: true,
      title: 'hunkwise',
      terminal: 'xterm-256color',
    });

    this.footerBox = blessed.box({
      parent: this.screen,
      bottom: 0,
      left: 0,
      width: '100%',
      height: 1,
      tags: true,
    });

    setupKeyBindings(
      this.screen,
      {
        exit: () => this.exit(),
        cursorDown: () => this.current?.view.moveCursor(1),
        cursorUp: () => this.current?.view.moveCursor(-1),
        pageDown: () => this.current?.view.page(1),
        pageUp: () => this.current?.view.page(-1),
        cursorTop: () => this.current?.view.setCursorLine(1),
        cursorBottom: () => {
          const view = this.current?.view;
          if (view) view.setCursorLine(view.lineCount);
        },
        toggleVisual: () => {
          this.current?.view.toggleVisual();
          this.renderFooter();
        },
        cancelVisual: () => {
          this.current?.view.cancelVisual();
          this.renderFooter();
        },
        runAction: (action) => this.runAction(action),
      },
      {
        hasActiveModal: () => this.activeModal !== null,
        mappings: this.config.mappings,
      }
    );

    this.screen.on('resize', () => {
      setImmediate(() => {
        for (const { buffer } of this.open.values()) buffer.setColumns(this.screen.cols);
        this.renderFooter();
      });
    });
  }

  /**
   * Open (or switch to) the status buffer of the repository containing `dir`.
   */
  async openRepository(dir: string): Promise<void> {
    const repository = await GitRepository.open(dir);
    const existing = this.open.get(repository.root);
    if (existing) {
      this.show(existing);
      return;
    }

    const view = new StatusView(this.screen, {
      disableSigns: this.config.disableSigns,
      disableContextHighlighting: this.config.disableContextHighlighting,
    });
    const entry: OpenBuffer = {
      view,
      buffer: new StatusBuffer({
        repository,
        viewport: view,
        config: this.config,
        confirm: (message) => this.confirm(message),
        columns: this.screen.cols,
        hint: formatHint(this.config.mappings),
      }),
    };
    this.wire(entry);
    this.open.set(repository.root, entry);
    this.show(entry);

    await this.registry.open(repository.root, () => entry.buffer);

    if (this.config.autoRefresh) {
      const watcher = new RepoWatcher(
        repository.root,
        () => entry.buffer.dispatchRefresh('watcher'),
        (message) => this.showMessage(message, 'error')
      );
      watcher.start();
      entry.buffer.attach(watcher);
    }
  }

  private wire(entry: OpenBuffer): void {
    const { buffer, view } = entry;
    buffer.on('render', (status) => view.setStatus(status));
    buffer.on('refreshed', () => {
      if (this.current === entry) this.renderFooter();
    });
    buffer.on('error', (message) => {
      if (this.current === entry) this.showMessage(message, 'error');
    });
    buffer.on('close', () => {
      this.open.delete(buffer.root);
      view.box.destroy();
      const next = [...this.open.values()].pop();
      if (next) {
        this.show(next);
      } else {
        this.exit();
      }
    });
  }

  private show(entry: OpenBuffer): void {
    if (this.current && this.current !== entry) this.current.view.box.hide();
    this.current = entry;
    entry.view.box.show();
    entry.view.box.focus();
    entry.view.draw();
    this.renderFooter();
  }

  private runAction(action: StatusAction): void {
    const entry = this.current;
    if (!entry) return;
    const { buffer, view } = entry;

    const run = (task: Promise<unknown>) => {
      task
        .then(() => {
          view.cancelVisual();
          this.renderFooter();
        })
        .catch((err) => {
          logger.error(`${action} failed`, err);
          this.showMessage(`${action} failed: ${logger.formatError(err)}`, 'error');
        });
    };

    switch (action) {
      case 'Toggle':
        buffer.toggle();
        break;
      case 'Stage':
        run(buffer.stage());
        break;
      case 'StageUnstaged':
        run(buffer.stageModified());
        break;
      case 'StageAll':
        run(buffer.stageAll());
        break;
      case 'Unstage':
        run(buffer.unstage());
        break;
      case 'UnstageStaged':
        run(buffer.unstageAll());
        break;
      case 'Discard':
        run(buffer.discard());
        break;
      case 'Depth1':
        buffer.setFolds(FOLD_DEPTHS[1]);
        break;
      case 'Depth2':
        buffer.setFolds(FOLD_DEPTHS[2]);
        break;
      case 'Depth3':
        buffer.setFolds(FOLD_DEPTHS[3]);
        break;
      case 'Depth4':
        buffer.setFolds(FOLD_DEPTHS[4]);
        break;
      case 'GoToFile':
        this.goTo(buffer.goToFile());
        break;
      case 'GoToNextHunkHeader':
        buffer.nextHunk();
        break;
      case 'GoToPreviousHunkHeader':
        buffer.previousHunk();
        break;
      case 'RefreshBuffer':
        this.renderFooter(true);
        run(buffer.refresh('user'));
        break;
      case 'YankSelected':
        this.yank(buffer.yank());
        view.cancelVisual();
        break;
      case 'Close':
        buffer.close();
        break;
    }
  }

  private async confirm(message: string): Promise<boolean> {
    const modal = new DiscardConfirm(this.screen, message);
    this.activeModal = modal;
    try {
      return await modal.answer;
    } finally {
      this.activeModal = null;
      this.current?.view.box.focus();
    }
  }

  private goTo(target: EditTarget | null): void {
    if (!target) return;

    if (target.type === 'file' && target.submodule) {
      this.openRepository(target.absolutePath).catch((err) => {
        this.showMessage(`Cannot open ${target.path}: ${logger.formatError(err)}`, 'error');
      });
      return;
    }

    const cwd = this.current?.buffer.root ?? this.initialPath;
    let command: string;
    let args: string[];
    if (target.type === 'file') {
      const [editor, ...editorArgs] = (process.env.VISUAL || process.env.EDITOR || 'vi').split(/\s+/);
      command = editor;
      args = [...editorArgs, ...(target.line !== undefined ? [`+${target.line}`] : []), target.absolutePath];
    } else {
      command = 'git';
      args = ['show', target.ref];
    }

    logger.debug(`Running ${command} ${args.join(' ')}`);
    this.screen.exec(command, args, { cwd }, (err: unknown) => {
      if (err) {
        this.showMessage(`${command} failed: ${logger.formatError(err)}`, 'error');
      }
      this.current?.buffer.dispatchRefresh('editor');
    });
  }

  /**
   * Copy to the terminal clipboard with an OSC 52 sequence.
   */
  private yank(text: string | null): void {
    if (!text) return;
    process.stdout.write(`\x1b]52;c;${Buffer.from(text).toString('base64')}\x07`);
    this.showMessage(`Yanked ${text}`, 'info');
  }

  private showMessage(text: string, kind: 'info' | 'error'): void {
    this.message = { text, kind };
    if (this.messageTimer) clearTimeout(this.messageTimer);
    this.messageTimer = setTimeout(() => {
      this.messageTimer = null;
      this.message = null;
      this.renderFooter();
    }, MESSAGE_TIMEOUT_MS);
    this.renderFooter();
  }

  private renderFooter(refreshing?: boolean): void {
    const entry = this.current;
    const content = formatFooter(
      {
        root: entry ? abbreviateHomePath(entry.buffer.root) : '',
        visual: entry?.view.visualActive ?? false,
        refreshing: refreshing ?? entry?.buffer.isRefreshing ?? false,
        others: Math.max(0, this.open.size - 1),
        message: this.message,
      },
      this.screen.cols
    );
    this.footerBox.setContent(content);
    this.screen.render();
  }

  /**
   * Exit the application cleanly.
   */
  exit(): void {
    if (this.messageTimer) clearTimeout(this.messageTimer);
    this.registry
      .closeAll()
      .catch((err) => logger.error('Failed to close buffers', err))
      .finally(() => this.screen.destroy());
  }

  /**
   * Start the application (returns when app exits).
   */
  async start(): Promise<void> {
    const exited = new Promise<void>((resolve) => {
      this.screen.on('destroy', () => resolve());
    });
    try {
      await this.openRepository(this.initialPath);
    } catch (err) {
      this.screen.destroy();
      throw err;
    }
    await exited;
  }
}
