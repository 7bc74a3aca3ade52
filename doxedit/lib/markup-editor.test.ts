/**
 * Tests for the whole-file markup rewrites
 */

import { describe, it, expect } from 'vitest';
import {
  injectTitle,
  removeQuickIndexLinks,
  renameModuleTerminology,
  retargetMainPage,
  restorePlaceholders,
  OBSCURED_COLON_COLON,
  OBSCURED_ASTERISK_SLASH,
  isClassFile,
  descriptionFileFor,
  addAttributeLinks,
  isPackageGroupFile,
  changeComponentToPackageLinks,
  removeBreaksFromTable,
  needsPreUnescape,
  unescapeAtSignsInPre,
  editHtmlContent,
  type EditOptions,
} from './markup-editor.ts';
import { FileAccessError } from './errors.ts';
import { createMemoryLogger } from './output.ts';

function options(overrides: Partial<EditOptions> = {}): EditOptions {
  return {
    baseTitle: 'API Docs',
    userMainPage: false,
    readSibling: () => '',
    logger: createMemoryLogger().logger,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Titles, navigation and terminology
// ---------------------------------------------------------------------------

describe('injectTitle', () => {
  it('prefixes the derived title with the base title', () => {
    const html = '<html><head><title>Project: bsl::Vector</title></head>';
    expect(injectTitle(html, 'classbsl_1_1Vector-members.html', 'API Docs'))
      .toBe('<html><head><title>API Docs: Class bsl::Vector Members</title></head>');
  });

  it('uses the base title alone for unrecognized pages', () => {
    expect(injectTitle('<title>Files</title>', 'files.html', 'API Docs')).toBe('<title>API Docs</title>');
  });

  it('replaces a title spanning several lines', () => {
    expect(injectTitle('<title>\nold\n</title>\n', 'files.html', 'API Docs')).toBe('<title>API Docs</title>\n');
  });

  it('inserts the base title literally', () => {
    expect(injectTitle('<title>x</title>', 'files.html', 'Docs $& $1')).toBe('<title>Docs $& $1</title>');
  });
});

describe('removeQuickIndexLinks', () => {
  it('drops Main/Alpha/Namespace entries with their separator', () => {
    const html = '<div class="qindex"><a class="qindex" href="main.html">Main&nbsp;Page</a> | '
      + '<a class="qindexHL" href="modules.html">Modules</a></div>';
    expect(removeQuickIndexLinks(html))
      .toBe('<div class="qindex"> <a class="qindexHL" href="modules.html">Modules</a></div>');
  });

  it('leaves other quick-index entries alone', () => {
    const html = '<a class="qindex" href="files.html">File&nbsp;List</a> | ';
    expect(removeQuickIndexLinks(html)).toBe(html);
  });
});

describe('renameModuleTerminology', () => {
  const input = 'Modules | module list | the Module | modules.html | submodule | modular';

  it('renames whole-word module(s), preserving capitalization', () => {
    expect(renameModuleTerminology(input))
      .toBe('Components | component list | the Component | components.html | submodule | modular');
  });

  it('is idempotent', () => {
    const once = renameModuleTerminology(input);
    expect(renameModuleTerminology(once)).toBe(once);
  });
});

describe('retargetMainPage', () => {
  it('points main.html links at components.html', () => {
    expect(retargetMainPage('<a href="main.html">x</a> domain.html'))
      .toBe('<a href="components.html">x</a> domain.html');
  });
});

describe('restorePlaceholders', () => {
  it('restores :: and */', () => {
    const text = `bsl${OBSCURED_COLON_COLON}Vector /* note ${OBSCURED_ASTERISK_SLASH}`;
    expect(restorePlaceholders(text)).toBe('bsl::Vector /* note */');
  });
});

// ---------------------------------------------------------------------------
// Class pages
// ---------------------------------------------------------------------------

describe('isClassFile', () => {
  it('accepts class pages but not their member lists', () => {
    expect(isClassFile('classbdlt_1_1Date.html')).toBe(true);
    expect(isClassFile('classbdlt_1_1Date-members.html')).toBe(false);
    expect(isClassFile('structbdlt_1_1Date.html')).toBe(false);
    expect(isClassFile('classbdlt_1_1Date.css')).toBe(false);
  });
});

describe('descriptionFileFor', () => {
  it('maps a class page to its component page', () => {
    expect(descriptionFileFor('classbdlt_1_1Date.html')).toBe('group__bdlt__date.html');
  });
});

describe('addAttributeLinks', () => {
  const classPage = [
    '<p>See the Attributes section under @DESCRIPTION in the component-level documentation.</p>',
    '<p>@DESCRIPTION again, see bsldoc_glossary.</p>',
  ].join('\n');

  const componentPage = [
    '<ul>',
    '<a href="#description">Description </a> <ul>',
    '<a href="#attributes">Attributes </a> </li>',
    '</ul>',
  ].join('\n');

  it('links the marker sentence, descriptions and glossary', () => {
    expect(addAttributeLinks(classPage, 'group__bdlt__date.html', componentPage)).toBe([
      '<p>See the <A  href="group__bdlt__date.html#attributes">Attributes</A> section under '
        + '<A  href="group__bdlt__date.html#description">@DESCRIPTION</A> in the component-level documentation.</p>',
      '<p><A  href="group__bdlt__date.html#description">@DESCRIPTION</A> again, see '
        + '<A href="group__bsldoc__glossary.html">bsldoc_glossary</A>.</p>',
    ].join('\n'));
  });

  it('does not wrap its own links a second time', () => {
    const once = addAttributeLinks(classPage, 'group__bdlt__date.html', componentPage);
    expect(addAttributeLinks(once, 'group__bdlt__date.html', componentPage)).toBe(once);
  });

  it('does not wrap its own fragment-less links a second time', () => {
    const once = addAttributeLinks(classPage, 'group__bdlt__date.html', '');
    expect(addAttributeLinks(once, 'group__bdlt__date.html', '')).toBe(once);
  });

  it('links to the page without a fragment when anchors are missing', () => {
    const result = addAttributeLinks(classPage, 'group__bdlt__date.html', '');
    expect(result.split('\n')[0]).toBe(
      '<p>See the <A  href="group__bdlt__date.html">Attributes</A> section under '
        + '<A  href="group__bdlt__date.html">@DESCRIPTION</A> in the component-level documentation.</p>',
    );
  });
});

// ---------------------------------------------------------------------------
// Group pages
// ---------------------------------------------------------------------------

describe('isPackageGroupFile', () => {
  it.each([
    ['group__bsl.html', true],
    ['group__z__bae.html', true],
    ['group__bslstl.html', false],
    ['group__bsl__vector.html', false],
    ['bsl.html', false],
  ])('%s → %s', (filename, expected) => {
    expect(isPackageGroupFile(filename)).toBe(expected);
  });
});

describe('changeComponentToPackageLinks', () => {
  it('renames the navigation link and section header', () => {
    const { logger, err } = createMemoryLogger({ verboseLevel: 1 });
    const html = 'x\n<a href="#groups">Components</a>  </div>\n<h2>\nComponents</h2></td></tr>\n';
    expect(changeComponentToPackageLinks(html, logger))
      .toBe('x\n<a href="#groups">Packages</a>  </div>\n<h2>\nPackages</h2></td></tr>\n');
    expect(err).toEqual([]);
  });

  it('reports each missing fragment on the verbose channel', () => {
    const { logger, err } = createMemoryLogger({ verboseLevel: 1 });
    expect(changeComponentToPackageLinks('nothing here', logger)).toBe('nothing here');
    expect(err).toEqual([
      'changeComponentToPackageLinks: no match1',
      'changeComponentToPackageLinks: no match2',
    ]);
  });
});

describe('removeBreaksFromTable', () => {
  it('removes line breaks before closing table cells', () => {
    expect(removeBreaksFromTable('a\n<br/></td></tr>\nb\n<br/></td></tr>\nc'))
      .toBe('a\n</td></tr>\nb\n</td></tr>\nc');
  });
});

// ---------------------------------------------------------------------------
// Escaped at-signs
// ---------------------------------------------------------------------------

describe('unescapeAtSignsInPre', () => {
  it('unescapes only inside pre ranges and normalizes the final newline', () => {
    const input = [
      '<p>\\@ outside</p>',
      '<pre class="fragment">',
      '  x = \\@foo;',
      '</pre>',
      '<p>\\@ after</p>',
      '<pre>one \\@ line</pre>',
      '', '', '',
    ].join('\n');

    expect(unescapeAtSignsInPre(input)).toBe([
      '<p>\\@ outside</p>',
      '<pre class="fragment">',
      '  x = @foo;',
      '</pre>',
      '<p>\\@ after</p>',
      '<pre>one @ line</pre>',
    ].join('\n') + '\n');
  });

  it('skips source listings', () => {
    expect(needsPreUnescape('bslstl__vector_8h_source.html')).toBe(false);
    expect(needsPreUnescape('bslstl__vector_8h.html')).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// editHtmlContent
// ---------------------------------------------------------------------------

describe('editHtmlContent', () => {
  it('applies every step to a package-group page', () => {
    const input = [
      '<html><head><title>Doxygen</title></head>',
      '<a class="qindex" href="main.html">Main&nbsp;Page</a> | <a class="qindex" href="modules.html">Modules</a>',
      '<a href="#groups">Components</a>  </div>',
      '<tr><td colspan="2"><h2>',
      'Components</h2></td></tr>',
      '<tr><td>x',
      '<br/></td></tr>',
      '<pre>\\@x</pre>',
    ].join('\n');

    expect(editHtmlContent(input, 'group__bsl.html', options())).toBe([
      '<html><head><title>API Docs: bsl Package Group</title></head>',
      ' <a class="qindex" href="components.html">Components</a>',
      '<a href="#groups">Packages</a>  </div>',
      '<tr><td colspan="2"><h2>',
      'Packages</h2></td></tr>',
      '<tr><td>x',
      '</td></tr>',
      '<pre>@x</pre>',
    ].join('\n') + '\n');
  });

  it('leaves titles and main.html alone when so configured', () => {
    const input = '<title>Mine</title>\n<a href="main.html">home</a>\n';
    const result = editHtmlContent(input, 'files.html', options({ baseTitle: '', userMainPage: true }));
    expect(result).toBe(input);
  });

  it('keeps source listings byte-for-byte apart from the text rewrites', () => {
    const input = '<pre>\\@x</pre>';
    expect(editHtmlContent(input, 'bslstl__vector_8h_source.html', options({ baseTitle: '' }))).toBe(input);
  });

  it('reads the component page for class pages that need attribute links', () => {
    const requested: string[] = [];
    const input = '<p>See the Attributes section under @DESCRIPTION in the component-level documentation.</p>\n';
    const result = editHtmlContent(input, 'classbdlt_1_1Date.html', options({
      baseTitle: '',
      readSibling: (name) => {
        requested.push(name);
        return '\n<a href="#d1">Description </a> <ul>\n<a href="#a1">Attributes </a> </li>\n';
      },
    }));

    expect(requested).toEqual(['group__bdlt__date.html']);
    expect(result).toBe(
      '<p>See the <A  href="group__bdlt__date.html#a1">Attributes</A> section under '
        + '<A  href="group__bdlt__date.html#d1">@DESCRIPTION</A> in the component-level documentation.</p>\n',
    );
  });

  it('warns and leaves links unanchored when the component page cannot be read', () => {
    const { logger, err } = createMemoryLogger();
    const input = '<p>See the Attributes section under @DESCRIPTION in the component-level documentation.</p>\n';
    const result = editHtmlContent(input, 'classbdlt_1_1Date.html', options({
      baseTitle: '',
      logger,
      readSibling: (name) => {
        throw new FileAccessError('read', `html/${name}`, new Error('ENOENT'));
      },
    }));

    expect(err).toEqual(['⚠ cannot read html/group__bdlt__date.html: ENOENT']);
    expect(result).toContain('<A  href="group__bdlt__date.html">Attributes</A>');
  });
});
