export function escapeHtml(value: unknown): string {
    if (value === null || value === undefined) return '';
    return String(value)
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#x27;');
}

export function formatNum(n: number | null | undefined, digits = 2): string {
    return typeof n === 'number' && Number.isFinite(n) ? n.toFixed(digits) : (0).toFixed(digits);
}

/** 0.625 -> "62.5%" */
export function formatPercent(fraction: number, digits = 1): string {
    return `${formatNum(fraction * 100, digits)}%`;
}

export function formatRecord(wins: number, losses: number, ties = 0): string {
    return ties > 0 ? `${wins}-${losses}-${ties}` : `${wins}-${losses}`;
}

/** "2024-09-12T17:03:00.000Z" -> "2024-09-12 17:03 UTC" */
export function formatTimestamp(iso: string): string {
    if (!iso) return '';
    return `${iso.slice(0, 16).replace('T', ' ')} UTC`;
}

/**
 * Cells are inserted as given, so callers escape text before passing it in.
 */
export function renderTable(headers: string[], rows: string[][], className = ''): string {
    const lines: string[] = [];
    lines.push(className ? `<table class="${className}">` : '<table>');
    lines.push(`<thead><tr>${headers.map(h => `<th>${escapeHtml(h)}</th>`).join('')}</tr></thead>`);
    lines.push('<tbody>');
    for (const row of rows) {
        lines.push(`<tr>${row.map(cell => `<td>${cell}</td>`).join('')}</tr>`);
    }
    lines.push('</tbody>');
    lines.push('</table>');
    return lines.join('\n');
}

const STYLE = `
body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif; margin: 0; background: #f5f6f8; color: #1d2330; }
nav { background: #1d2330; padding: 12px 24px; }
nav a { color: #fff; margin-right: 16px; text-decoration: none; }
main { max-width: 1100px; margin: 0 auto; padding: 24px; }
table { border-collapse: collapse; width: 100%; margin: 12px 0 24px; background: #fff; }
th, td { border: 1px solid #d8dbe2; padding: 6px 10px; text-align: left; }
th { background: #eceef3; }
.week-links a { display: inline-block; margin: 4px 8px 4px 0; padding: 4px 10px; background: #fff; border: 1px solid #d8dbe2; border-radius: 4px; text-decoration: none; }
.muted { color: #6b7280; }
.winner { font-weight: bold; }
`.trim();

export type PageOptions = {
    title: string;
    body: string;
    root: string; // relative path back to the reports root, '' or '../'
};

export function renderPage({ title, body, root }: PageOptions): string {
    const lines: string[] = [];
    lines.push('<!DOCTYPE html>');
    lines.push('<html lang="en">');
    lines.push('<head>');
    lines.push('<meta charset="utf-8">');
    lines.push('<meta name="viewport" content="width=device-width, initial-scale=1">');
    lines.push(`<title>${escapeHtml(title)}</title>`);
    lines.push(`<style>\n${STYLE}\n</style>`);
    lines.push('</head>');
    lines.push('<body>');
    lines.push(`<nav><a href="${root}index.html">All seasons</a></nav>`);
    lines.push('<main>');
    lines.push(body);
    lines.push('</main>');
    lines.push('</body>');
    lines.push('</html>');
    return lines.join('\n') + '\n';
}
