import { describe, it, expect } from "vitest";
import { CalendarBuilder, describeCollection, eventId, slugify, titleCase } from "./calendarBuilder";
import type { CollectionEvent } from "./types";

const TZ = "Europe/London";

const collections: CollectionEvent[] = [
  {
    date: new Date("2025-12-02T06:00:00Z"),
    type: "Refuse",
    instructions: [],
    note: "Date changed due to bank holiday.",
  },
  {
    date: new Date("2025-12-02T06:00:00Z"),
    type: "Recycling",
    instructions: [
      { text: "Rinse containers before recycling.", links: [] },
      {
        text: "Missed collection? Report missed recycling collection",
        links: ["https://my.redbridge.gov.uk/MissedCollection/recycling"],
      },
    ],
    note: "",
  },
  {
    date: new Date("2025-12-03T06:00:00Z"),
    type: "Garden Waste",
    instructions: [],
    note: "",
  },
];

function unfold(ics: string): string {
  return ics.replace(/\r\n[ \t]/g, "");
}

function lines(ics: string, prefix: string): string[] {
  return unfold(ics)
    .split("\r\n")
    .filter((line) => line.startsWith(prefix));
}

describe("CalendarBuilder", () => {
  const builder = new CalendarBuilder({
    name: "Redbridge Collections",
    description: "Household waste & recycling (scraped)",
    timezone: TZ,
    startHour: 6,
  });

  it("should emit one event per collection with stable identifiers", () => {
    const ics = builder.build(collections);

    expect(lines(ics, "UID:")).toEqual([
      "UID:refuse-20251202@redbridge-ics",
      "UID:recycling-20251202@redbridge-ics",
      "UID:garden-waste-20251203@redbridge-ics",
    ]);
  });

  it("should produce identical output when rebuilt from the same events", () => {
    expect(builder.build(collections)).toBe(builder.build(collections));
  });

  it("should title the events and tag them with their stream", () => {
    const ics = builder.build(collections);

    expect(lines(ics, "SUMMARY:")).toContain("SUMMARY:Bin: Refuse");
    expect(lines(ics, "SUMMARY:")).toContain("SUMMARY:Bin: Garden Waste");
    expect(lines(ics, "CATEGORIES:")).toEqual([
      "CATEGORIES:Refuse",
      "CATEGORIES:Recycling",
      "CATEGORIES:Garden Waste",
    ]);
  });

  it("should add reminders 11 hours and 30 minutes before each collection", () => {
    const triggers = lines(builder.build(collections), "TRIGGER");

    expect(triggers).toHaveLength(6);
    expect(triggers.slice(0, 2)).toEqual(["TRIGGER:-PT11H", "TRIGGER:-PT30M"]);
  });

  it("should carry the feed name, description and publish method", () => {
    const ics = unfold(builder.build(collections));

    expect(ics).toContain("METHOD:PUBLISH\r\n");
    expect(ics).toContain("X-WR-CALNAME:Redbridge Collections\r\n");
    expect(ics).toContain("CALSCALE:GREGORIAN\r\n");
  });

  it("should span one hour from the stamped start", () => {
    const ics = builder.build(collections.slice(0, 1));

    expect(lines(ics, "DTSTART")).toEqual(["DTSTART:20251202T060000Z"]);
    expect(lines(ics, "DTEND")).toEqual(["DTEND:20251202T070000Z"]);
  });

  it("should refuse an empty calendar name", () => {
    expect(() => new CalendarBuilder({ name: " ", timezone: TZ, startHour: 6 })).toThrow(
      "Calendar name is required"
    );
  });
});

describe("describeCollection", () => {
  it("should fall back to the default instruction and list the note", () => {
    const [refuse] = collections;
    if (!refuse) {
      throw new Error("missing fixture");
    }

    expect(describeCollection(refuse, 6)).toBe(
      [
        "INSTRUCTIONS",
        "• Place bins out by 06:00 on collection day.",
        "",
        "NOTE",
        "• Date changed due to bank holiday.",
      ].join("\n")
    );
  });

  it("should separate missed-collection links from other links", () => {
    const event: CollectionEvent = {
      date: new Date("2025-12-04T07:00:00Z"),
      type: "Food Waste",
      instructions: [
        { text: "Use the kerbside caddy.", links: ["https://www.example.org/caddies"] },
        { text: "Problems? Tell us.", links: ["https://my.redbridge.gov.uk/MissedCollection/food"] },
        { text: "Missed collection?", links: ["https://www.example.org/caddies"] },
      ],
      note: "Bank holiday week\nCollections a day late",
    };

    expect(describeCollection(event, 7)).toBe(
      [
        "INSTRUCTIONS",
        "• Use the kerbside caddy.",
        "• Problems? Tell us.",
        "• Missed collection?",
        "",
        "MISSED COLLECTION",
        "• https://my.redbridge.gov.uk/MissedCollection/food",
        "",
        "LINKS",
        "• https://www.example.org/caddies",
        "",
        "NOTE",
        "• Bank holiday week",
        "• Collections a day late",
      ].join("\n")
    );
  });

  it("should omit empty sections", () => {
    const recycling = collections[1];
    if (!recycling) {
      throw new Error("missing fixture");
    }

    expect(describeCollection(recycling, 6)).toBe(
      [
        "INSTRUCTIONS",
        "• Rinse containers before recycling.",
        "• Missed collection? Report missed recycling collection",
        "",
        "MISSED COLLECTION",
        "• https://my.redbridge.gov.uk/MissedCollection/recycling",
      ].join("\n")
    );
  });
});

describe("helpers", () => {
  it("should title-case and slugify stream names", () => {
    expect(titleCase("garden WASTE")).toBe("Garden Waste");
    expect(titleCase("  ")).toBe("Collection");
    expect(slugify("Food Waste")).toBe("food-waste");
  });

  it("should derive the identifier from the local calendar date", () => {
    const lateEvening: CollectionEvent = {
      date: new Date("2025-06-30T23:30:00Z"),
      type: "Food Waste",
      instructions: [],
      note: "",
    };

    expect(eventId(lateEvening, TZ)).toBe("food-waste-20250701@redbridge-ics");
  });
});
