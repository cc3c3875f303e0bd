// reset to the terminal's default color
const reset = "\x1b[0m";

const colors = {
    red: 31,
    green: 32,
    yellow: 33,
    blue: 34,
    cyan: 36,
} as const;

export type Color = keyof typeof colors;

export function color(text: string, name: Color): string {
    // no escape codes when output is piped into a file
    if (!process.stdout.isTTY) return text;
    return `\x1b[${colors[name]}m${text}${reset}`;
}
