import { describe, it, expect } from "vitest";
import {
  formatRunDate,
  renderDigestHtml,
  renderDigestSubject,
  WEATHER_UNAVAILABLE_MESSAGE,
} from "./renderer";
import type { DigestRenderInput } from "./renderer";
import {
  createTestContent,
  dayWindow,
  fullWeather,
} from "../test-utils/fixtures";

const runDate = new Date("2026-10-19T05:30:00Z");

function renderInput(overrides?: Partial<DigestRenderInput>): DigestRenderInput {
  return {
    recipientName: "Ada",
    content: createTestContent(),
    runDate,
    timeZone: "Europe/Berlin",
    ...overrides,
  };
}

function countOccurrences(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

describe("renderDigestHtml", () => {
  it("should render valid HTML structure with DOCTYPE and proper tags", () => {
    const html = renderDigestHtml(renderInput());

    expect(html.startsWith("<!DOCTYPE html>\n<html>")).toBe(true);
    expect(html).toContain('<meta charset="utf-8">');
    expect(html).toContain("<body");
    expect(html.endsWith("</body>\n</html>")).toBe(true);
  });

  it("should use inline styles instead of a style element", () => {
    const html = renderDigestHtml(renderInput());

    expect(html).toContain('style="');
    expect(html).not.toContain("<style>");
  });

  it("should greet the recipient by name with the run date", () => {
    const html = renderDigestHtml(renderInput());

    expect(html).toContain("Good Morning, Ada! ☀️</h1>");
    expect(html).toContain(">Monday, October 19, 2026</p>");
  });

  it("should place greeting, quote, fact and weather in that order", () => {
    const html = renderDigestHtml(renderInput());

    const positions = [
      html.indexOf("Good Morning, Ada!"),
      html.indexOf('data-section="quote"'),
      html.indexOf('data-section="fact"'),
      html.indexOf('data-section="weather"'),
    ];

    expect(positions.every((p) => p >= 0)).toBe(true);
    expect([...positions].sort((a, b) => a - b)).toEqual(positions);
  });

  it("should render the quote text and author", () => {
    const html = renderDigestHtml(renderInput());

    expect(html).toContain("&ldquo;Stay curious.&rdquo;");
    expect(html).toContain("&mdash; Test Author</p>");
  });

  it("should render the fact", () => {
    const html = renderDigestHtml(renderInput());

    expect(html).toContain('<p style="margin: 0;">Octopuses have three hearts.</p>');
  });

  describe("weather block", () => {
    it("should render a day/night table when both windows are present", () => {
      const html = renderDigestHtml(renderInput());

      expect(countOccurrences(html, 'data-section="weather"')).toBe(1);
      expect(html).toContain("🌤️ Weather in Goettingen</h2>");
      expect(html).toContain("<table");
      expect(html).toContain(">10.0°C – 18.0°C</td>");
      expect(html).toContain(">5.0°C – 9.0°C</td>");
      expect(html).not.toContain(WEATHER_UNAVAILABLE_MESSAGE);
    });

    it("should render every metric row for day and night", () => {
      const html = renderDigestHtml(renderInput());

      expect(html).toContain(">Feels like</td>");
      expect(html).toContain(">8.5°C – 17.2°C</td>");
      expect(html).toContain(">3.1°C – 7.4°C</td>");
      expect(html).toContain(">Humidity</td>");
      expect(html).toContain(">55% – 80%</td>");
      expect(html).toContain(">82% – 90%</td>");
      expect(html).toContain(">Chance of rain</td>");
      expect(html).toContain(">5% – 40%</td>");
      expect(html).toContain(">10% – 20%</td>");
    });

    it("should include the clothing recommendation in the full state", () => {
      const html = renderDigestHtml(renderInput());

      expect(html).toContain(
        "<strong>👔 What to wear today:</strong> Light jacket or hoodie 👕 | Bring an umbrella just in case ☂️</p>",
      );
    });

    it("should describe the day's conditions when a weather code is present", () => {
      const html = renderDigestHtml(
        renderInput({
          content: createTestContent({
            weather: { ...fullWeather, weatherCode: 2 },
          }),
        }),
      );

      expect(html).toContain(
        '<p style="margin: 0 0 10px 0; font-size: 16px;"><strong>Forecast:</strong> Partly cloudy ⛅</p>',
      );
      expect(html.indexOf("Forecast:")).toBeLessThan(html.indexOf("<table"));
    });

    it("should omit the forecast line without a weather code", () => {
      const html = renderDigestHtml(renderInput());

      expect(html).not.toContain("Forecast:");
    });

    it("should not describe conditions in the degraded state", () => {
      const html = renderDigestHtml(
        renderInput({
          content: createTestContent({
            weather: { ...fullWeather, night: null, weatherCode: 61 },
          }),
        }),
      );

      expect(html).toContain(WEATHER_UNAVAILABLE_MESSAGE);
      expect(html).not.toContain("Forecast:");
    });

    it("should render the unavailable notice without numbers when weather is absent", () => {
      const html = renderDigestHtml(
        renderInput({ content: createTestContent({ weather: null }) }),
      );

      expect(countOccurrences(html, 'data-section="weather"')).toBe(1);
      expect(html).toContain(
        `<p style="margin: 0; color: #7f8c8d;">${WEATHER_UNAVAILABLE_MESSAGE}</p>`,
      );
      expect(html).not.toContain("<table");
      expect(html).not.toContain("°C");
      expect(html).not.toContain("%");
      expect(html).not.toContain("What to wear");
    });

    it("should fall back to the unavailable notice when the night window is missing", () => {
      const html = renderDigestHtml(
        renderInput({
          content: createTestContent({
            weather: { ...fullWeather, night: null },
          }),
        }),
      );

      expect(html).toContain(WEATHER_UNAVAILABLE_MESSAGE);
      expect(html).not.toContain("°C");
    });

    it("should fall back to the unavailable notice when the day window is missing", () => {
      const html = renderDigestHtml(
        renderInput({
          content: createTestContent({
            weather: { ...fullWeather, day: null },
          }),
        }),
      );

      expect(html).toContain(WEATHER_UNAVAILABLE_MESSAGE);
      expect(countOccurrences(html, 'data-section="weather"')).toBe(1);
    });

    it("should format temperatures to one decimal and percentages as integers", () => {
      const html = renderDigestHtml(
        renderInput({
          content: createTestContent({
            weather: {
              ...fullWeather,
              day: {
                ...dayWindow,
                temperature: { min: -2.25, max: 3 },
                relativeHumidity: { min: 61.4, max: 77.6 },
              },
            },
          }),
        }),
      );

      expect(html).toContain(">-2.3°C – 3.0°C</td>");
      expect(html).toContain(">61% – 78%</td>");
    });
  });

  it("should escape HTML in every interpolated value", () => {
    const html = renderDigestHtml(
      renderInput({
        recipientName: "<b>Tom & Jerry</b>",
        content: createTestContent({
          quote: { text: '<script>alert("x")</script>', author: "O'Brien" },
          fact: "1 < 2 & 3 > 2",
          weather: { ...fullWeather, location: "<Nowhere>" },
        }),
      }),
    );

    expect(html).not.toContain("<script>");
    expect(html).not.toContain("<b>");
    expect(html).toContain("Good Morning, &lt;b&gt;Tom &amp; Jerry&lt;/b&gt;!");
    expect(html).toContain(
      "&ldquo;&lt;script&gt;alert(&quot;x&quot;)&lt;/script&gt;&rdquo;",
    );
    expect(html).toContain("&mdash; O&#39;Brien</p>");
    expect(html).toContain("1 &lt; 2 &amp; 3 &gt; 2");
    expect(html).toContain("Weather in &lt;Nowhere&gt;</h2>");
  });

  it("should vary only the greeting between recipients", () => {
    const forAda = renderDigestHtml(renderInput({ recipientName: "Ada" }));
    const forGrace = renderDigestHtml(renderInput({ recipientName: "Grace" }));

    expect(forGrace).toBe(forAda.replaceAll("Ada", "Grace"));
  });

  it("should produce byte-identical output for identical input", () => {
    const input = renderInput();

    expect(renderDigestHtml(input)).toBe(renderDigestHtml(input));
  });
});

describe("formatRunDate", () => {
  it("should use the calendar date of the given timezone", () => {
    const lateEvening = new Date("2026-10-18T22:30:00Z");

    expect(formatRunDate(lateEvening, "Europe/Berlin")).toBe(
      "Monday, October 19, 2026",
    );
    expect(formatRunDate(lateEvening, "UTC")).toBe("Sunday, October 18, 2026");
  });
});

describe("renderDigestSubject", () => {
  it("should name the recipient and the short date", () => {
    expect(renderDigestSubject("Ada", runDate, "Europe/Berlin")).toBe(
      "Good Morning Ada! ☀️ Oct 19",
    );
  });

  it("should zero-pad single-digit days", () => {
    expect(
      renderDigestSubject("Ada", new Date("2026-10-05T06:00:00Z"), "Europe/Berlin"),
    ).toBe("Good Morning Ada! ☀️ Oct 05");
  });
});
