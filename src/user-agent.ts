// Default per-tag styles, applied beneath author rules

import { parseStylesheet, type StyleRule } from './stylesheet.ts';

const USER_AGENT_CSS = `
html, body, div, section, article, header, footer, nav, main, aside,
form, fieldset, ul, ol, li, dl, dt, dd, figure, figcaption, pre,
blockquote, address, details, summary, table, p, h1, h2, h3, h4, h5, h6, hr {
  display: block;
}

head, style, script, title, meta, link, template, noscript {
  display: none;
}

body { margin: 8px; }

h1 { font-size: 2em; margin-top: 0.67em; margin-bottom: 0.67em; font-weight: bold; }
h2 { font-size: 1.5em; margin-top: 0.83em; margin-bottom: 0.83em; font-weight: bold; }
h3 { font-size: 1.17em; margin-top: 1em; margin-bottom: 1em; font-weight: bold; }
h4 { margin-top: 1.33em; margin-bottom: 1.33em; font-weight: bold; }
h5 { font-size: 0.83em; margin-top: 1.67em; margin-bottom: 1.67em; font-weight: bold; }
h6 { font-size: 0.67em; margin-top: 2.33em; margin-bottom: 2.33em; font-weight: bold; }

p, ul, ol, blockquote, figure { margin-top: 1em; margin-bottom: 1em; }
ul, ol { padding-left: 40px; }
blockquote, figure { margin-left: 40px; margin-right: 40px; }
hr { margin-top: 0.5em; margin-bottom: 0.5em; border: 1px inset gray; }

b, strong, th { font-weight: bold; }
i, em, cite, var, dfn { font-style: italic; }
pre, code, kbd, samp { font-family: monospace; }
small { font-size: smaller; }
a { color: #0000ee; cursor: pointer; }

button, input, select, textarea, img { display: inline-block; }
button {
  padding: 1px 6px;
  border: 2px outset #767676;
  background-color: #f0f0f0;
  cursor: pointer;
}
input, textarea, select {
  padding: 1px 2px;
  border: 2px inset #767676;
  background-color: white;
}
input[type="hidden"] { display: none; }
`;

/**
 * User-agent rules, parsed once at module load and frozen.
 */
export const USER_AGENT_RULES: readonly StyleRule[] = Object.freeze(
  parseStylesheet(USER_AGENT_CSS, { origin: 'user-agent' })
);
