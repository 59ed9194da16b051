/**
 * Main layout component
 * Type-safe HTML using @kitajs/html JSX
 */

// 422 responses carry a re-rendered form with its validation error, so they are swapped
const HTMX_CONFIG = JSON.stringify({
  responseHandling: [
    { code: '204', swap: false },
    { code: '[23]..', swap: true },
    { code: '422', swap: true, error: false },
    { code: '[45]..', swap: false, error: true }
  ]
});

type LayoutChild = JSX.Element | LayoutChild[];

export interface LayoutProps {
  title?: string;
  children: LayoutChild | LayoutChild[];
}

export function Layout({ title, children }: LayoutProps): JSX.Element {
  return (
    <>
      {'<!DOCTYPE html>'}
      <html lang="en" data-theme="light">
        <head>
          <meta charset="UTF-8" />
          <meta name="viewport" content="width=device-width, initial-scale=1.0" />
          <meta name="htmx-config" content={HTMX_CONFIG} />
          <title safe>{title ? `${title} - ` : ''}Song Catalog</title>

          {/* PicoCSS - Classless theme */}
          <link
            rel="stylesheet"
            href="https://cdn.jsdelivr.net/npm/@picocss/pico@2/css/pico.min.css"
          />

          {/* HTMX for interactivity */}
          <script src="https://unpkg.com/htmx.org@2.0.0"></script>

          <style>{`
            #toast-container { position: fixed; top: 1rem; right: 1rem; z-index: 1000; display: flex; flex-direction: column; gap: 0.5rem; }
            .toast { padding: 0.75rem 1rem; border-radius: 0.375rem; background: var(--pico-card-background-color); box-shadow: 0 2px 6px rgba(0, 0, 0, 0.2); opacity: 0; transition: opacity 0.3s ease; }
            .toast.show { opacity: 1; }
            .toast-success { border-left: 4px solid var(--pico-ins-color); }
            .toast-error { border-left: 4px solid var(--pico-del-color); }
            .toast-warning { border-left: 4px solid #e6a700; }
            .toast-info { border-left: 4px solid var(--pico-primary); }
            #song-list tbody tr { cursor: pointer; }
            .form-error { color: var(--pico-del-color); }
          `}</style>
        </head>
        <body>
          <div id="toast-container"></div>

          <main class="container">
            {children}
          </main>

          <script>{`
            function showToast(message, type = 'info', duration = null) {
              if (duration === null) {
                duration = (type === 'error' || type === 'warning') ? 8000 : 4000;
              }

              const container = document.getElementById('toast-container');
              const toast = document.createElement('div');
              toast.className = 'toast toast-' + type;
              toast.setAttribute('role', 'status');
              toast.textContent = message;
              container.appendChild(toast);

              setTimeout(() => toast.classList.add('show'), 10);
              setTimeout(() => {
                toast.classList.remove('show');
                setTimeout(() => toast.remove(), 300);
              }, duration);

              return toast;
            }

            document.body.addEventListener('htmx:afterRequest', function(event) {
              const xhr = event.detail.xhr;
              const encoded = xhr.getResponseHeader('X-Toast-Message');
              const toastType = xhr.getResponseHeader('X-Toast-Type') || 'info';

              if (encoded) {
                showToast(decodeURIComponent(encoded), toastType);
              } else if (!event.detail.successful && xhr.status >= 400) {
                showToast('Request failed. Please try again.', 'error');
              }
            });

            function clearEditorPanel() {
              document.getElementById('editor-panel').innerHTML = '';
            }

            window.showToast = showToast;
            window.clearEditorPanel = clearEditorPanel;
          `}</script>
        </body>
      </html>
    </>
  );
}
