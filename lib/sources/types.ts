export type WikiInfo = {
  title?: string;
  summary?: string;
  syllabus?: string;
  pattern?: string;
  sections: Record<string, string>;
};

export type Video = {
  title: string;
  id: string;
  url: string;
};

export type Playlist = {
  title: string;
  id: string;
  url: string;
};

export type Book = {
  title?: string;
  authors?: string[];
  publisher?: string;
  infoLink?: string;
};

export type PyqLink = {
  site: string;
  exam: string;
  title: string;
  link: string;
};

export type ExamInfo = {
  query: string;
  wikipedia: WikiInfo;
  videos: Video[];
  playlist: Playlist | null;
  books: Book[];
  pyqs: PyqLink[];
};
