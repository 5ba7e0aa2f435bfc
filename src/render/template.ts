/**
 * Static parts of the report page. Nothing here interpolates user data; the
 * per-conversation markup comes from fragments.ts.
 */

export const REPORT_STYLES = `
    html, body {
        font-family: "Roboto", "Helvetica Neue", Arial, sans-serif;
        margin: 0;
        padding: 0;
        background-color: #f0f0f0;
    }
    [hidden] {
        display: none !important;
    }
    h1, h2 {
        color: #333;
        text-align: center;
        margin: 20px 0;
    }
    .conversation_group {
        background: #efe7dd;
        padding: 10px 20px 20px 20px;
        margin: 20px auto;
        max-width: 800px;
        border: 1px solid #ccc;
        box-shadow: 0 2px 5px rgba(0,0,0,0.1);
        border-radius: 8px;
    }
    .conversation-header {
        display: flex;
        align-items: center;
        justify-content: space-between;
        gap: 12px;
        border-bottom: 2px solid #128c7e;
    }
    .conversation-header h2 {
        color: #075e54;
        flex: 1;
        margin: 10px 0;
    }
    .disclosure {
        background: #fff;
        border: 1px solid #128c7e;
        border-radius: 14px;
        color: #075e54;
        cursor: pointer;
        font-size: 12px;
        padding: 4px 10px;
        white-space: nowrap;
    }
    .disclosure:hover {
        background: #dcf8c6;
    }
    .disclosure.inert,
    .disclosure:disabled {
        border-color: #ccc;
        color: #aaa;
        cursor: default;
        background: transparent;
    }
    .conversation-container {
        overflow-x: hidden;
        padding: 0 16px;
    }
    .conversation-container::after,
    .day-panel::after {
        content: "";
        display: table;
        clear: both;
    }
    .date-divider {
        clear: both;
        text-align: center;
        margin: 14px 0 6px 0;
    }
    .date-divider span {
        background: #e1f3fb;
        border-radius: 6px;
        color: #4a4a4a;
        display: inline-block;
        font-size: 12px;
        padding: 4px 10px;
        box-shadow: 0 1px 1px rgba(0,0,0,0.1);
    }
    .day-panel {
        opacity: 0.85;
    }
    .message {
        color: #000;
        clear: both;
        line-height: 18px;
        font-size: 15px;
        padding: 8px;
        position: relative;
        margin: 8px 0;
        max-width: 85%;
        word-wrap: break-word;
        box-shadow: 0 1px 1px rgba(0,0,0,0.1);
    }
    .message::after {
        position: absolute;
        content: "";
        width: 0;
        height: 0;
        border-style: solid;
    }
    .sender {
        color: #128c7e;
        display: block;
        font-size: 13px;
        font-weight: 600;
        margin-bottom: 2px;
    }
    .metadata {
        display: inline-block;
        float: right;
        padding: 0 0 0 7px;
        position: relative;
        bottom: -4px;
    }
    .metadata .time {
        color: rgba(0, 0, 0, .45);
        font-size: 11px;
        display: inline-block;
    }
    .message.received {
        background: #fff;
        border-radius: 0px 5px 5px 5px;
        float: left;
    }
    .message.received::after {
        border-width: 0px 10px 10px 0;
        border-color: transparent #fff transparent transparent;
        top: 0;
        left: -10px;
    }
    .message.sent {
        background: #e1ffc7;
        border-radius: 5px 0px 5px 5px;
        float: right;
    }
    .message.sent::after {
        border-width: 0px 0 10px 10px;
        border-color: transparent transparent transparent #e1ffc7;
        top: 0;
        right: -10px;
    }
`;

// Shared by every conversation: a control names its panel in data-reveal.
export const DISCLOSURE_SCRIPT = `
    document.addEventListener("click", function (event) {
        var target = event.target;
        if (!(target instanceof Element)) return;
        var control = target.closest("[data-reveal]");
        if (!control || control.hasAttribute("disabled")) return;
        var panel = document.getElementById(control.getAttribute("data-reveal"));
        if (panel) panel.hidden = false;
        control.hidden = true;
    });
`;

export interface DocumentParts {
  /** Already escaped. */
  titleHtml: string;
  bodyLines: string[];
}

export function renderDocument(parts: DocumentParts): string {
  return [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '  <meta charset="UTF-8">',
    '  <meta name="viewport" content="width=device-width, initial-scale=1.0">',
    `  <title>${parts.titleHtml}</title>`,
    `  <style>${REPORT_STYLES}</style>`,
    "</head>",
    "<body>",
    `<h1>${parts.titleHtml}</h1>`,
    ...parts.bodyLines,
    `<script>${DISCLOSURE_SCRIPT}</script>`,
    "</body>",
    "</html>",
  ].join("\n");
}
