/**
 * Plain column table: bold header row, then one row per record.
 *
 * @module ui/components/Table
 */
import React from 'react';
import { Box, Text } from 'ink';
import { theme } from '../themes/colors.js';

export interface TableColumn<K extends string> {
    key: K;
    header: string;
    color?: string;
}

export interface TableProps<K extends string> {
    columns: ReadonlyArray<TableColumn<K>>;
    rows: ReadonlyArray<Readonly<Record<K, string>>>;
    title?: string;
}

/**
 * Column width: longest cell or header plus two spaces of gutter.
 */
export function columnWidths<K extends string>(
    columns: ReadonlyArray<TableColumn<K>>,
    rows: ReadonlyArray<Readonly<Record<K, string>>>,
): number[] {
    return columns.map(col =>
        rows.reduce((max, row) => Math.max(max, row[col.key].length), col.header.length) + 2);
}

export function Table<K extends string>({ columns, rows, title }: TableProps<K>): React.ReactElement {
    const widths = columnWidths(columns, rows);
    return (
        <Box flexDirection="column">
            {title && <Text bold color={theme.text.primary}>{title}</Text>}
            <Box>
                {columns.map((col, i) => (
                    <Box key={col.key} width={widths[i]}>
                        <Text bold color={theme.text.accent}>{col.header}</Text>
                    </Box>
                ))}
            </Box>
            {rows.map((row, r) => (
                <Box key={`row-${r}`}>
                    {columns.map((col, i) => (
                        <Box key={col.key} width={widths[i]}>
                            <Text color={col.color}>{row[col.key]}</Text>
                        </Box>
                    ))}
                </Box>
            ))}
        </Box>
    );
}
