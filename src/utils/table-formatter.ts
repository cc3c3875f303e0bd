import wcwidth from "wcwidth";
import { color, Color } from "@utils/color-string.js";

export type ColumnName = string;

export type Column = {
    name: ColumnName;
    width: number;
};

export type Cell = {
    value: string | number;
    color?: Color;
}

export type Row = Record<ColumnName, Cell>;

const ellipsis = "...";

export class TableFormatter {
    constructor(private readonly columns: Column[]) { }

    // pad to the display width, wide characters count twice
    private padString(str: string, length: number): string {
        const strWidth = wcwidth(str);
        if (strWidth <= length) {
            return str + " ".repeat(length - strWidth);
        }

        const availableWidth = length - wcwidth(ellipsis);
        let truncated = "";
        let currentWidth = 0;
        for (const char of str) {
            const charWidth = wcwidth(char);
            if (currentWidth + charWidth > availableWidth) break;
            truncated += char;
            currentWidth += charWidth;
        }
        return truncated + ellipsis + " ".repeat(Math.max(0, availableWidth - currentWidth));
    }

    private formatRow(row: Row): string {
        return this.columns
            .map((col) => {
                const cell = row[col.name];
                const value = this.padString(cell ? String(cell.value) : "", col.width);
                return cell?.color ? color(value, cell.color) : value;
            })
            .join(" ");
    }

    public formatTable(data: Row[]): string {
        const header = this.columns.map((col) => this.padString(col.name, col.width)).join(" ");
        const separator = this.columns.map((col) => "-".repeat(col.width)).join(" ");
        const rows = data.map((row) => this.formatRow(row));
        return [header, separator, ...rows].join("\n");
    }
}
