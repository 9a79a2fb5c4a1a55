/**
 * Shared DOM utilities. Everything takes the owning Document so the same code
 * runs against the browser page and a detached test document.
 */

export function createElement(doc: Document, tag: string, className?: string, text?: string): HTMLElement {
  const element = doc.createElement(tag);
  if (className) element.className = className;
  if (text !== undefined) element.textContent = text;
  return element;
}

export function createMessage(doc: Document, className: string, text: string): HTMLElement {
  const el = createElement(doc, 'div', `col-12 text-center ${className}`, text);
  el.setAttribute('role', className === 'error-message' ? 'alert' : 'status');
  return el;
}

export function requireElement(doc: Document, id: string): HTMLElement {
  const el = doc.getElementById(id);
  if (!el) throw new Error(`Missing #${id} in page markup`);
  return el;
}

export function isCheckbox(el: Element | null): el is HTMLInputElement {
  return el !== null && el.tagName === 'INPUT' && el.getAttribute('type') === 'checkbox';
}

export function isImage(el: Element | null): el is HTMLImageElement {
  return el !== null && el.tagName === 'IMG';
}
