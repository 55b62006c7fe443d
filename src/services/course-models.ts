// Course domain records shared by ingestion, the vector store and the tools

export interface Lesson {
  lessonNumber: number;
  title: string;
  lessonLink?: string;
}

export interface Course {
  title: string; // Unique identifier across the catalog
  courseLink?: string;
  instructor?: string;
  lessons: Lesson[];
}

export interface CourseChunk {
  content: string;
  courseTitle: string;
  lessonNumber?: number;
  chunkIndex: number;
}
