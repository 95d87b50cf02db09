/**
 * Test Fixtures
 * A small in-memory site and reusable markup
 */

export const BASE_URL = 'https://example.test/';

export const contactPageHtml = `
<!DOCTYPE html>
<html>
<head>
  <title>Contact</title>
  <style>.hero { width: 300px; }</style>
</head>
<body>
  <h1>Contact Us</h1>
  <p>Call us at (555) 123-4567 or 555-987-6543 near zip 30301-1234</p>
  <img src="/img/team.png" alt="Team">
  <img src="https://cdn.other.test/logo.svg" alt="Logo">
  <a href="https://example.test/">Home</a>
  <a href="https://example.test/about">About</a>
  <a href="https://example.test/about">About again</a>
  <a href="/relative">Relative</a>
  <a href="mailto:info@example.test">Mail</a>
  <a href="https://elsewhere.test/page">Elsewhere</a>
  <script>var tracking = "ignored words";</script>
</body>
</html>
`;

/**
 * Home → about, contact; about → home, contact; contact → home, about, and a
 * missing page
 */
export const sitePages: Record<string, string> = {
  'https://example.test/': `
    <html><body>
      <p>Welcome home</p>
      <a href="https://example.test/about">About</a>
      <a href="https://example.test/contact">Contact</a>
      <img src="/img/logo.png">
    </body></html>`,
  'https://example.test/about': `
    <html><body>
      <p>About the team</p>
      <a href="https://example.test/">Home</a>
      <a href="https://example.test/contact">Contact</a>
    </body></html>`,
  'https://example.test/contact': `
    <html><body>
      <p>Phone 555-987-6543 zip 30301</p>
      <a href="https://example.test/">Home</a>
      <a href="https://example.test/about">About</a>
      <a href="https://example.test/missing">Missing</a>
      <a href="https://elsewhere.test/">Elsewhere</a>
    </body></html>`,
};
