import fs from "fs";
import path from "path";
import { LessonInfo } from "../domain/lesson";

/**
 * Lesson Loader - reads plain-text lessons from a course directory
 *
 * Layout: <coursePath>/<section>/<lesson>.txt
 * Sections are read in name order and files in name order within each
 * section; lessons are numbered 1..N across the whole course in that order.
 * The first line of each file is its title ("# Lesson: Nouns" -> "Nouns").
 */

const LESSON_EXTENSION = ".txt";

/**
 * Turn a lesson file's first line into a title
 */
export function parseLessonTitle(firstLine: string, lessonId: number): string {
  const title = firstLine
    .replace(/^\s*#+\s*/, "")
    .replace(/^lesson\s*\d*\s*:\s*/i, "")
    .trim();
  return title || `Lesson ${lessonId}`;
}

function listSections(coursePath: string): string[] {
  return fs
    .readdirSync(coursePath, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
}

function listLessonFiles(sectionPath: string): string[] {
  return fs
    .readdirSync(sectionPath, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(LESSON_EXTENSION))
    .map((entry) => entry.name)
    .sort();
}

/**
 * Get metadata for every lesson in the course, in lesson order
 */
export function getLessonMetadata(coursePath: string): LessonInfo[] {
  if (!fs.existsSync(coursePath)) {
    console.warn(`[LessonLoader] Course path not found: ${coursePath}`);
    return [];
  }

  const lessons: LessonInfo[] = [];
  let lessonId = 1;

  for (const section of listSections(coursePath)) {
    const sectionPath = path.join(coursePath, section);

    for (const fileName of listLessonFiles(sectionPath)) {
      const filePath = path.join(sectionPath, fileName);
      try {
        const content = fs.readFileSync(filePath, "utf-8");
        const firstLine = content.split(/\r?\n/, 1)[0] ?? "";
        lessons.push({
          lessonId,
          title: parseLessonTitle(firstLine, lessonId),
          section,
          fileName,
          filePath,
          fileSize: fs.statSync(filePath).size,
        });
        lessonId++;
      } catch (error) {
        console.error(`[LessonLoader] Failed to read ${filePath}:`, error);
      }
    }
  }

  return lessons;
}

/**
 * Read a lesson's full text
 */
export function loadLessonText(lesson: LessonInfo): string {
  return fs.readFileSync(lesson.filePath, "utf-8");
}
