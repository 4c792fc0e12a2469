/**
 * Markup contract for the member activity feed. Bump the version whenever a
 * selector below changes meaning so stored files record which rules produced
 * them.
 */
export const EXTRACTION_CONTRACT = "linkedin-activity-feed@1";

export const LINKEDIN_SELECTORS = {
  HOME_URL: "https://www.linkedin.com",

  FEED: {
    POST_CONTAINER:
      'div[data-urn^="urn:li:activity:"], div[data-urn^="urn:li:share:"], div[data-urn^="urn:li:ugcPost:"], div.feed-shared-update-v2, [data-id^="urn:li:activity:"]',
    EMPTY_STATE: ".artdeco-empty-state, .pv-recent-activity-detail__no-content",
    SHOW_MORE_BUTTON: "button.scaffold-finite-scroll__load-button",
  },

  POST: {
    URN_ATTRIBUTES: ["data-urn", "data-id"],
    PERMALINK: 'a[href*="/feed/update/urn:li:"]',
    TEXT: ".update-components-text, .feed-shared-inline-show-more-text, .feed-shared-update-v2__description, .feed-shared-text",
    TEXT_NOISE: "button, .visually-hidden, .feed-shared-inline-show-more-text__see-more-less-toggle",
    ACTOR: ".update-components-actor, .feed-shared-actor",
    ACTOR_LINK: "a.update-components-actor__meta-link, a.update-components-actor__image, a.feed-shared-actor__container-link",
    TIME: "time[datetime]",
    SUB_DESCRIPTION: ".update-components-actor__sub-description, .feed-shared-actor__sub-description",
    MEDIA: "img[src], video[src], video[poster]",
    MEDIA_EXCLUDED_SCOPE: ".update-components-actor, .feed-shared-actor, .social-details-social-activity, .comments-comments-list, .update-components-header",
    ARTICLE_LINK: ".update-components-article a[href], .feed-shared-article a[href]",
  },

  AUTH: {
    LOGIN_FORM: 'form.login__form, input#username, a[href*="/login"]',
  },

  UNAVAILABLE: {
    MARKERS: ".not-found__container, .profile-unavailable, .error-container",
  },
};

export const URN_PATTERN = /urn:li:(?:activity|share|ugcPost):\d+/;
