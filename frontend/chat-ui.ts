/*
  Chat page presentation logic.
  ChatUi decides what happens; a ChatRenderer does the DOM work, so the
  logic can run against a fake renderer in tests.
*/

export const LOADING_IMAGE_SRC = '/static/images/loading.svg';

export interface ChatRenderer {
  readPrompt(): string;
  appendUserMessage(text: string): void;
  appendBotPlaceholder(): void;
  scrollToBottom(): void;
  setFormEnabled(enabled: boolean): void;
  focusPrompt(): void;
  setLoadingVisible(): void;
  // Drops loading placeholders and the response-target marker
  clearPendingResponse(): void;
}

export class ChatUi {
  constructor(private readonly renderer: ChatRenderer) {}

  insertUserPrompt(): void {
    const prompt = this.renderer.readPrompt();
    if (!prompt) {
      return;
    }

    this.renderer.appendUserMessage(prompt);
    this.scrollToBottom();
  }

  insertBotPlaceholder(): void {
    this.renderer.appendBotPlaceholder();
    this.scrollToBottom();
  }

  scrollToBottom(): void {
    this.renderer.scrollToBottom();
  }

  enableFormFields(): void {
    this.renderer.setFormEnabled(true);
    this.renderer.focusPrompt();
  }

  disableFormFields(): void {
    this.renderer.setFormEnabled(false);
  }

  showLoadingIndicator(): void {
    this.renderer.setLoadingVisible();
  }

  removeLoadingIndicator(): void {
    this.renderer.clearPendingResponse();
  }
}

export class DomChatRenderer implements ChatRenderer {
  constructor(private readonly doc: Document) {}

  readPrompt(): string {
    return this.doc.querySelector<HTMLInputElement>('#prompt')?.value ?? '';
  }

  appendUserMessage(text: string): void {
    const message = this.div('chat-message user');
    const body = this.div('msg');
    body.textContent = text;
    message.append(body);

    this.history()?.append(message);
  }

  appendBotPlaceholder(): void {
    const message = this.div('chat-message chatbot response-target');
    const container = this.div('chat-loading-indicator-container');
    const body = this.div('msg');

    const indicator = this.doc.createElement('img');
    indicator.id = 'loading-indicator';
    indicator.className = 'htmx-indicator';
    indicator.src = LOADING_IMAGE_SRC;

    body.append(indicator);
    container.append(body);
    message.append(container);

    this.history()?.append(message);
  }

  scrollToBottom(): void {
    const history = this.history();
    if (history) {
      history.scrollTop = history.scrollHeight;
    }
  }

  setFormEnabled(enabled: boolean): void {
    this.doc
      .querySelectorAll<HTMLInputElement | HTMLButtonElement>("#chat-form > input[type='text'], #chat-form > button")
      .forEach((field) => {
        field.disabled = !enabled;
      });
  }

  focusPrompt(): void {
    this.doc.querySelector<HTMLInputElement>('#prompt')?.focus();
  }

  setLoadingVisible(): void {
    const indicator = this.doc.querySelector<HTMLElement>('#loading-indicator');
    if (indicator) {
      indicator.style.opacity = '1';
    }
  }

  clearPendingResponse(): void {
    this.doc.querySelectorAll('.chat-loading-indicator-container').forEach((el) => el.remove());
    this.doc.querySelectorAll('.response-target').forEach((el) => el.classList.remove('response-target'));
  }

  private history(): HTMLElement | null {
    return this.doc.querySelector<HTMLElement>('#chat-history');
  }

  private div(className: string): HTMLDivElement {
    const el = this.doc.createElement('div');
    el.className = className;
    return el;
  }
}

declare global {
  interface Window {
    chatUi?: ChatUi;
    insertUserPrompt?: () => void;
    insertBotPlaceholder?: () => void;
    scrollToBottom?: () => void;
    enableFormFields?: () => void;
    disableFormFields?: () => void;
    showLoadingIndicator?: () => void;
    removeLoadingIndicator?: () => void;
  }
}

// Exposes the global functions the page's event handlers call
export function installChatUi(win: Window): ChatUi {
  const ui = new ChatUi(new DomChatRenderer(win.document));

  win.chatUi = ui;
  win.insertUserPrompt = () => ui.insertUserPrompt();
  win.insertBotPlaceholder = () => ui.insertBotPlaceholder();
  win.scrollToBottom = () => ui.scrollToBottom();
  win.enableFormFields = () => ui.enableFormFields();
  win.disableFormFields = () => ui.disableFormFields();
  win.showLoadingIndicator = () => ui.showLoadingIndicator();
  win.removeLoadingIndicator = () => ui.removeLoadingIndicator();

  win.oncontextmenu = () => false;

  return ui;
}
