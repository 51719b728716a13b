export interface Section {
  name: string;
  startIndex: number;
  endIndex: number;
}

const MAX_HEADING_LENGTH = 80;
const MAX_NUMBERED_HEADING_WORDS = 8;

export class SectionDetectionService {
  private readonly markdownHeading = /^#{1,6}\s+(.+?)\s*#*$/;
  private readonly numberedHeading = /^(\d+(?:\.\d+)*)\.?\s+([A-Z][^.!?:;]*)$/;
  private readonly capitalizedHeading = /^(?=.*[A-Z])[A-Z0-9 &/,'()-]{3,}$/;

  detectSections(text: string): Section[] {
    const sections: Section[] = [];
    const lines = text.split('\n');
    let offset = 0;

    for (const line of lines) {
      const name = this.headingName(line.trim());
      if (name) {
        const previous = sections[sections.length - 1];
        if (previous) {
          previous.endIndex = offset;
        }
        sections.push({ name, startIndex: offset, endIndex: text.length });
      }
      offset += line.length + 1;
    }

    return sections;
  }

  /**
   * Name of the section containing `position`, or undefined before the first heading.
   */
  sectionAt(sections: Section[], position: number): string | undefined {
    for (let i = sections.length - 1; i >= 0; i--) {
      if (sections[i].startIndex <= position) {
        return sections[i].name;
      }
    }
    return undefined;
  }

  private headingName(line: string): string | undefined {
    if (!line || line.length > MAX_HEADING_LENGTH) {
      return undefined;
    }

    const markdown = line.match(this.markdownHeading);
    if (markdown) {
      return markdown[1];
    }

    const numbered = line.match(this.numberedHeading);
    if (numbered && numbered[2].trim().split(/\s+/).length <= MAX_NUMBERED_HEADING_WORDS) {
      return `${numbered[1]} ${numbered[2].trim()}`;
    }

    if (this.capitalizedHeading.test(line)) {
      return line;
    }

    return undefined;
  }
}
