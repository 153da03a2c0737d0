/**
 * CSS hooks of the research portal's rendered UI.
 *
 * These are the only site-specific strings outside config.  When the portal
 * ships a redesign, this is the file to update.
 */

export const SELECTORS = {
  login: {
    identifier: '#barcode',
    secret: '#pin',
    /** Present on every page once the session is authenticated. */
    homeMarker: '#site-nav__home',
  },
  catalog: {
    sectionHeader: '.investment-ideas__section-header',
    card: '.mdc-investment-list-card',
    cardTitle: '.mdc-card__title',
    sidePanelToggle: '.mdc-side-panel__toggle',
  },
  tables: {
    direct: '.pick-list__table-container',
    indirect: '.model-portfolio__table-container',
    headerCell: 'thead th',
    bodyGroup: 'tbody',
    row: 'tr',
    cell: '.mdc-table-cell',
  },
  newsletter: {
    heading: '.mdc-heading',
    anchor: 'a',
    download: '.article__article-download',
  },
} as const;

export type TableSelectors = typeof SELECTORS.tables;
