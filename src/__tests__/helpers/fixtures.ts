/**
 * Test Fixtures
 * A small government site served by the fake HTTP client
 */

import { FakeRoute } from './mocks';

export const SITE_URL = 'https://www.agency.df.gov.br';
export const SITE_NAME = 'Example Agency';

export const homepageHtml = `
<!DOCTYPE html>
<html>
<head><title>Example Agency - Official Site</title></head>
<body>
  <header>
    <ul id="primary-menu">
      <li class="menu-item"><a href="/about">About</a></li>
      <li class="menu-item">
        <a href="/services">Services</a>
        <ul class="sub-menu">
          <li class="menu-item"><a href="/services/apply">Apply</a></li>
        </ul>
      </li>
      <li class="menu-item"><a href="https://portal.df.gov.br/">Portal</a></li>
      <li class="menu-item"><a href="/files/guide.pdf">Guide</a></li>
    </ul>
  </header>
  <div class="content">
    <p>Welcome</p>
  </div>
</body>
</html>
`;

export const aboutHtml = `
<html>
<head><title>About - Example Agency</title></head>
<body>
  <div class="breadcrumb"><a href="/">Home</a> / <a href="/about">About</a></div>
  <div class="content">
    <aside class="sidebar"><h3>Institutional</h3><a href="/about">About</a></aside>
    <section><p>History</p></section>
    <section><p>Mission</p></section>
    <form action="/contact"><input name="email"></form>
    <a href="/wp-content/uploads/report.pdf">Report</a>
    <a href="/wp-content/uploads/report.pdf">Report again</a>
    <a href="https://transparency.df.gov.br/data.xlsx">Open data</a>
  </div>
</body>
</html>
`;

export const servicesHtml = `
<html>
<head><title>Services - Example Agency</title></head>
<body>
  <div class="content">
    <div class="accordion"><p>Question</p></div>
    <div class="widget"><p>Highlights</p></div>
  </div>
</body>
</html>
`;

export const applyHtml = `
<html>
<head><title>Apply - Example Agency</title></head>
<body>
  <nav class="breadcrumb">
    <a href="/">Início</a>
    <a href="/services">Services</a>
    <span class="current">Apply</span>
  </nav>
  <div class="content">
    <a href="/">Home</a>
    <a href="/services">Services</a>
    <a href="/services/apply/form">Application form</a>
    <a href="/files/form.docx">Form template</a>
  </div>
</body>
</html>
`;

export const formHtml = `
<html>
<head><title>Application form - Example Agency</title></head>
<body>
  <div class="content"><p>Fill in the form.</p></div>
</body>
</html>
`;

export const contactHtml = `
<html>
<head><title>Contact - Example Agency</title></head>
<body>
  <ul class="breadcrumb"><li><a href="/">Home</a></li><li class="active">Contact</li></ul>
  <div class="content"><p>Phone</p></div>
</body>
</html>
`;

export const documentsHtml = `
<html>
<head><title>Documents - Example Agency</title></head>
<body>
  <div class="breadcrumbs">
    <a href="/">Home</a>
    <a href="/services">Services</a>
    <a href="/services/apply">Apply</a>
    <strong>Documents</strong>
  </div>
  <div class="content"><a href="/services/apply">Back</a></div>
</body>
</html>
`;

export const pressRoomHtml = `
<html>
<head><title>Press - Example Agency</title></head>
<body>
  <div class="breadcrumb"><a href="/">Home</a><span>Sala de Imprensa</span></div>
  <div class="content"><p>Releases</p></div>
</body>
</html>
`;

export const orphanHtml = `
<html>
<head><title>Orphan - Example Agency</title></head>
<body><div class="content"><p>No trail here</p></div></body>
</html>
`;

export const sitemapIndexXml = `<?xml version="1.0" encoding="UTF-8"?>
<sitemapindex xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
  <sitemap><loc>${SITE_URL}/page-sitemap.xml</loc></sitemap>
</sitemapindex>
`;

export const pageSitemapXml = `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
  <url><loc>${SITE_URL}/about/</loc></url>
  <url><loc>${SITE_URL}/contact</loc></url>
  <url><loc>${SITE_URL}/noticias/some-story</loc></url>
  <url><loc>${SITE_URL}/orphan</loc></url>
  <url><loc>${SITE_URL}/press-room</loc></url>
  <url><loc>${SITE_URL}/services/apply/documents</loc></url>
</urlset>
`;

export const emptySitemapXml = `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9"></urlset>
`;

/**
 * Every route of the fixture site
 */
export function siteRoutes(): Record<string, FakeRoute> {
  return {
    [SITE_URL]: { status: 200, body: homepageHtml },
    [`${SITE_URL}/about`]: { status: 200, body: aboutHtml },
    [`${SITE_URL}/services`]: { status: 200, body: servicesHtml },
    [`${SITE_URL}/services/apply`]: { status: 200, body: applyHtml },
    [`${SITE_URL}/services/apply/form`]: { status: 200, body: formHtml },
    [`${SITE_URL}/contact`]: { status: 200, body: contactHtml },
    [`${SITE_URL}/services/apply/documents`]: { status: 200, body: documentsHtml },
    [`${SITE_URL}/press-room`]: { status: 200, body: pressRoomHtml },
    [`${SITE_URL}/orphan`]: { status: 200, body: orphanHtml },
    [`${SITE_URL}/sitemap.xml`]: { status: 200, body: sitemapIndexXml },
    [`${SITE_URL}/page-sitemap.xml`]: { status: 200, body: pageSitemapXml },
  };
}
