/**
 * @jest-environment jsdom
 */
import { ChatUi, DomChatRenderer, installChatUi, type ChatRenderer } from './chat-ui';

const PAGE = `
  <div id="chat-history"></div>
  <form id="chat-form">
    <input id="prompt" type="text">
    <button type="submit">Send</button>
  </form>
`;

function chatHistory(): HTMLElement {
  const history = document.querySelector<HTMLElement>('#chat-history');
  if (!history) {
    throw new Error('chat history missing');
  }
  return history;
}

function promptInput(): HTMLInputElement {
  const prompt = document.querySelector<HTMLInputElement>('#prompt');
  if (!prompt) {
    throw new Error('prompt missing');
  }
  return prompt;
}

// jsdom does no layout, so give the panel a fixed height and a writable scrollTop
function fakeScrollGeometry(element: HTMLElement, scrollHeight: number): void {
  Object.defineProperty(element, 'scrollHeight', { configurable: true, value: scrollHeight });
  Object.defineProperty(element, 'scrollTop', { configurable: true, writable: true, value: 0 });
}

describe("ChatUi with the DOM renderer", () => {
  let ui: ChatUi;

  beforeEach(() => {
    document.body.innerHTML = PAGE;
    fakeScrollGeometry(chatHistory(), 480);
    ui = new ChatUi(new DomChatRenderer(document));
  });

  describe("insertUserPrompt", () => {
    it("should not touch the DOM for an empty prompt", () => {
      const before = document.body.innerHTML;

      ui.insertUserPrompt();

      expect(document.body.innerHTML).toBe(before);
      expect(chatHistory().scrollTop).toBe(0);
    });

    it("should append one user bubble and scroll to the bottom", () => {
      promptInput().value = 'Show me my character';

      ui.insertUserPrompt();

      const messages = document.querySelectorAll('#chat-history > .chat-message.user');
      expect(messages).toHaveLength(1);
      expect(messages[0].querySelector('.msg')?.textContent).toBe('Show me my character');
      expect(chatHistory().scrollTop).toBe(480);
    });

    it("should insert the prompt as text", () => {
      promptInput().value = '<b>bold</b>';

      ui.insertUserPrompt();

      const body = document.querySelector('.chat-message.user .msg');
      expect(body?.innerHTML).toBe('&lt;b&gt;bold&lt;/b&gt;');
      expect(body?.querySelector('b')).toBeNull();
    });
  });

  describe("insertBotPlaceholder", () => {
    it("should append a pending bot bubble with a loading indicator", () => {
      ui.insertBotPlaceholder();

      const target = document.querySelector('.chat-message.chatbot.response-target');
      const indicator = target?.querySelector<HTMLImageElement>('.chat-loading-indicator-container .msg img');
      expect(indicator?.id).toBe('loading-indicator');
      expect(indicator?.className).toBe('htmx-indicator');
      expect(indicator?.getAttribute('src')).toBe('/static/images/loading.svg');
      expect(chatHistory().scrollTop).toBe(480);
    });
  });

  describe("form fields", () => {
    it("should disable and re-enable the input and button", () => {
      const button = document.querySelector<HTMLButtonElement>('#chat-form > button');

      ui.disableFormFields();
      expect(promptInput().disabled).toBe(true);
      expect(button?.disabled).toBe(true);

      ui.enableFormFields();
      expect(promptInput().disabled).toBe(false);
      expect(button?.disabled).toBe(false);
      expect(document.activeElement).toBe(promptInput());
    });
  });

  describe("loading indicator", () => {
    it("should make the indicator fully visible", () => {
      ui.insertBotPlaceholder();

      ui.showLoadingIndicator();

      expect(document.querySelector<HTMLElement>('#loading-indicator')?.style.opacity).toBe('1');
    });

    it("should remove every placeholder and clear every response target", () => {
      ui.insertBotPlaceholder();
      ui.insertBotPlaceholder();

      ui.removeLoadingIndicator();

      expect(document.querySelectorAll('.chat-loading-indicator-container')).toHaveLength(0);
      expect(document.querySelectorAll('.response-target')).toHaveLength(0);
      expect(document.querySelectorAll('.chat-message.chatbot')).toHaveLength(2);
    });
  });
});

describe("ChatUi", () => {
  function recordingRenderer(prompt: string): ChatRenderer & { calls: string[] } {
    const calls: string[] = [];
    return {
      calls,
      readPrompt: () => prompt,
      appendUserMessage: (text) => calls.push(`user:${text}`),
      appendBotPlaceholder: () => calls.push('placeholder'),
      scrollToBottom: () => calls.push('scroll'),
      setFormEnabled: (enabled) => calls.push(`enabled:${enabled}`),
      focusPrompt: () => calls.push('focus'),
      setLoadingVisible: () => calls.push('loading'),
      clearPendingResponse: () => calls.push('clear'),
    };
  }

  it("should append then scroll for a prompt", () => {
    const renderer = recordingRenderer('hi');

    new ChatUi(renderer).insertUserPrompt();

    expect(renderer.calls).toEqual(['user:hi', 'scroll']);
  });

  it("should do nothing for an empty prompt", () => {
    const renderer = recordingRenderer('');

    new ChatUi(renderer).insertUserPrompt();

    expect(renderer.calls).toEqual([]);
  });

  it("should focus the prompt after enabling the form", () => {
    const renderer = recordingRenderer('');

    new ChatUi(renderer).enableFormFields();

    expect(renderer.calls).toEqual(['enabled:true', 'focus']);
  });
});

describe("installChatUi", () => {
  it("should expose the chat functions on the window", () => {
    document.body.innerHTML = PAGE;
    promptInput().value = 'hello';

    const ui = installChatUi(window);
    window.insertUserPrompt?.();

    expect(window.chatUi).toBe(ui);
    expect(document.querySelectorAll('.chat-message.user')).toHaveLength(1);

    const contextMenu = new MouseEvent('contextmenu', { cancelable: true });
    window.dispatchEvent(contextMenu);
    expect(contextMenu.defaultPrevented).toBe(true);
  });
});
