/**
 * selectors.ts: The content selectors the crawler depends on.
 *
 * When the site changes its markup, this is the file to update.
 */

export const LOGIN_SELECTORS = {
  username: '#username',
  password: '#password',
  submit: "button[type='submit']",
} as const;

export const ORGANIZATION_SELECTORS = {
  /** The "People" entry of an organization page's navigation bar. */
  peopleTab: "a[data-control-name='page_member_main_nav_people_tab']",
  /** One rendered member card. */
  memberCard: '.reusable-search__result-container',
} as const;

/** Sub-selectors, relative to a member card. */
export const CARD_SELECTORS = {
  name: '.entity-result__title-text',
  role: '.entity-result__primary-subtitle',
  profileLink: 'a.app-aware-link',
} as const;

/** Used to resolve relative profile links. */
export const SITE_ORIGIN = 'https://www.linkedin.com';
