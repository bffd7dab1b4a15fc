export const ERROR_CODES = {
  /**
   * {@link NetworkError}
   */
  NetworkError: 'DD100',

  /**
   * {@link ParseError}
   */
  ParseError: 'DD101',

  /**
   * {@link MissingFieldError}
   */
  MissingFieldError: 'DD102',

  /**
   * {@link UnsupportedPlatformError}
   */
  UnsupportedPlatformError: 'DD103',

  /**
   * {@link ArchiveError}
   */
  ArchiveError: 'DD104',

  /**
   * {@link FilesystemError}
   */
  FilesystemError: 'DD105',

  /**
   * {@link ProcessError}
   */
  ProcessError: 'DD106',
} as const
