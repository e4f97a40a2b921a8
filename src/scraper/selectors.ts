// Default selector candidates. Each field lists alternatives tried in order; the first hit wins.
// Any field can be overridden from the selectors YAML file (see selectors-config.ts).

export type SelectorList = readonly string[];

export interface ReviewSelectors {
  // Search / detail view
  searchResult: SelectorList;
  placeHeader: SelectorList;
  reviewsTab: SelectorList;

  // Lazy loading
  moreReviews: SelectorList;
  scrollContainer: SelectorList;
  expandText: SelectorList;

  // Review items
  item: SelectorList;
  author: SelectorList;
  rating: SelectorList;
  text: SelectorList;
  date: SelectorList;
  ownerResponse: SelectorList;
  ownerResponseText: SelectorList;
  ownerResponseDate: SelectorList;
}

export interface ProfileSelectors {
  // Login
  loggedInMarker: SelectorList;
  loginEmail: SelectorList;
  loginPassword: SelectorList;
  loginSubmit: SelectorList;

  // Company search / people page
  companySearchResult: SelectorList;
  peopleMarker: SelectorList;
  showMore: SelectorList;
  card: SelectorList;
  cardLink: SelectorList;
  cardName: SelectorList;
  cardSubtitle: SelectorList;

  // Profile detail page
  profileHeader: SelectorList;
  location: SelectorList;
  aboutExpand: SelectorList;
  aboutText: SelectorList;
  latestJob: SelectorList;
  latestJobTitle: SelectorList;
  latestJobCompany: SelectorList;
}

export interface SelectorConfig {
  reviews: ReviewSelectors;
  profiles: ProfileSelectors;
}

export const REVIEW_SELECTORS: ReviewSelectors = {
  searchResult: ['a.hfpxzc', "div[role='feed'] a[aria-label][href*='/maps/place/']"],
  placeHeader: ['h1.DUwDvf', "div[role='main'] h1"],
  reviewsTab: ["button[data-tab-index='1']", "button[aria-label*='Reviews']", "button[jsaction*='reviews']"],

  moreReviews: ["button[jsaction*='more-reviews']", "button[aria-label*='More reviews']"],
  scrollContainer: ['div.m6QErb.DxyBCb', "div[role='feed']"],
  expandText: ['button.w8nwRe'],

  item: ["div[role='article']", 'div[data-review-id]', "div[class*='review']"],
  author: ['div.d4r55', "div[class*='author']"],
  rating: ["span[role='img']"],
  text: ['span.wiI7pd', "div[class*='review-text']"],
  date: ['span.rsqaWe', "span[class*='date']"],
  ownerResponse: ['div.CDe7pd', "div[class*='owner-response']", "div[class*='response']", "div[class*='reply']"],
  ownerResponseText: ['div.wiI7pd', "div[class*='text']", "div[class*='content']", 'span'],
  ownerResponseDate: ['span.DZSIDd', "span[class*='date']", "span[class*='time']"],
};

export const PROFILE_SELECTORS: ProfileSelectors = {
  loggedInMarker: ["button[id^='ember'][aria-label*='Account']", 'img.global-nav__me-photo'],
  loginEmail: ['#username'],
  loginPassword: ['#password'],
  loginSubmit: ["button[type='submit']"],

  companySearchResult: [
    "div.search-results-container span.entity-result__title-text a[href*='/company/']",
    "ul.reusable-search__entity-result-list a[href*='/company/']",
  ],
  peopleMarker: ["li[class*='org-people-profile-card']", 'div.org-people__header', 'main'],
  showMore: ["button:has-text('Show more results')", 'button.scaffold-finite-scroll__load-button'],
  card: ["li[class*='org-people-profile-card']"],
  cardLink: ['div.artdeco-entity-lockup__title a[data-test-app-aware-link]', 'div.artdeco-entity-lockup__title a'],
  cardName: ['div.artdeco-entity-lockup__title a div', 'div.artdeco-entity-lockup__title'],
  cardSubtitle: ['div.artdeco-entity-lockup__subtitle div.lt-line-clamp--multi-line', 'div.artdeco-entity-lockup__subtitle'],

  profileHeader: ['h1'],
  location: [
    "xpath=//a[contains(@href, '/contact-info/')]/ancestor::div[1]/span[1]",
    'div.mt2 span.text-body-small',
  ],
  aboutExpand: ['section:has(#about) button.inline-show-more-text__button'],
  aboutText: ["section:has(#about) div.inline-show-more-text span[aria-hidden='true']"],
  latestJob: ['section:has(#experience) ul > li'],
  latestJobTitle: ["div.display-flex.align-items-center.mr1 span[aria-hidden='true']"],
  latestJobCompany: ["span.t-normal span[aria-hidden='true']"],
};

export const DEFAULT_SELECTORS: SelectorConfig = {
  reviews: REVIEW_SELECTORS,
  profiles: PROFILE_SELECTORS,
};

export const MAPS_SEARCH_URL_TEMPLATE = 'https://www.google.com/maps/search/{query}';
export const LINKEDIN_BASE_URL = 'https://www.linkedin.com';
export const LINKEDIN_LOGIN_URL = 'https://www.linkedin.com/login';
export const LINKEDIN_PEOPLE_URL_TEMPLATE = 'https://www.linkedin.com/company/{slug}/people/';
export const LINKEDIN_COMPANY_SEARCH_URL_TEMPLATE =
  'https://www.linkedin.com/search/results/companies/?keywords={query}';
export const LINKEDIN_FEED_FRAGMENT = 'linkedin.com/feed';

export const USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36';

export const LAUNCH_ARGS = [
  '--disable-blink-features=AutomationControlled',
  '--no-sandbox',
  '--disable-dev-shm-usage',
  '--disable-notifications',
  '--disable-popup-blocking',
];
