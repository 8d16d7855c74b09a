/**
 * UI components barrel export.
 *
 * @module ui/components
 */
export { Header, type HeaderProps } from './Header.js';
export { Spinner, type SpinnerProps } from './Spinner.js';
export { StatusMessage, type StatusMessageProps, type StatusType } from './StatusMessage.js';
export { Panel, type PanelProps } from './Panel.js';
export { Table, columnWidths, type TableColumn, type TableProps } from './Table.js';
export { SectionHeader, type SectionHeaderProps } from './SectionHeader.js';
export { getAsciiArt, getBannerContext, type BannerContext } from './AsciiArt.js';
